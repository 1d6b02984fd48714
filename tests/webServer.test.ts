import { createHash } from 'crypto';
import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import fetch, { RequestInit, Response } from 'node-fetch';
import WebSocket from 'ws';
import { FingerprintKeyBuilder } from '../src/application/services/FingerprintKeyBuilder.js';
import { GenerationService } from '../src/application/services/GenerationService.js';
import { GenerationResult } from '../src/core/entities/Job.js';
import { CacheStore } from '../src/infrastructure/cache/CacheStore.js';
import { AsyncFileManager } from '../src/infrastructure/files/AsyncFileManager.js';
import { ResultArchiver } from '../src/infrastructure/files/ResultArchiver.js';
import { ProgressPublisher } from '../src/infrastructure/progress/ProgressPublisher.js';
import { BatchProcessor } from '../src/infrastructure/queue/BatchProcessor.js';
import { JobRegistry } from '../src/infrastructure/queue/JobRegistry.js';
import { RateLimiter } from '../src/infrastructure/ratelimit/RateLimiter.js';
import { WebServer } from '../src/infrastructure/web/WebServer.js';
import { Deferred, FakeProvider, PNG_BYTES, deferred, sampleResult } from './fakes.js';

interface SocketTranscript {
  messages: unknown[];
  code: number;
  reason: string;
}

describe('WebServer', () => {
  let uploadDir: string;
  let provider: FakeProvider;
  let processor: BatchProcessor;
  let service: GenerationService;
  let server: WebServer;
  let baseUrl: string;
  let port: number;
  let videoStatus: number;

  async function start(generateLimit = 100, maxConcurrency = 10): Promise<void> {
    const registry = new JobRegistry();
    const publisher = new ProgressPublisher();
    const cache = new CacheStore(null);
    const files = new AsyncFileManager({ uploadDir });
    processor = new BatchProcessor(registry, provider, cache, publisher, {
      maxConcurrency,
      maxQueueSize: 100,
      cacheTtlSeconds: 3600,
      retry: { maxAttempts: 1, initialDelayMs: 1, maxDelayMs: 1, multiplier: 2, timeoutMs: 5000, jitter: false },
    });
    service = new GenerationService({
      registry,
      processor,
      cache,
      rateLimiter: new RateLimiter({
        now: () => 1_700_000_000_000,
        policies: {
          upload: { limit: 100, windowSeconds: 60 },
          generate: { limit: generateLimit, windowSeconds: 60 },
          api: { limit: 100, windowSeconds: 60 },
        },
      }),
      publisher,
      files,
      fingerprints: new FingerprintKeyBuilder(),
      provider,
      archiver: new ResultArchiver(files, {
        outputDir: path.join(uploadDir, 'outputs'),
        fetchFn: async () => new Response(Buffer.from('video'), { status: videoStatus }),
      }),
    });

    server = new WebServer(service, { port: 0, maxUploadBytes: 1024 });
    port = await server.start();
    baseUrl = `http://127.0.0.1:${port}`;
  }

  async function call(route: string, init?: RequestInit): Promise<{ status: number; body: unknown; retryAfter: string | null }> {
    const res = await fetch(`${baseUrl}${route}`, init);
    const body: unknown = await res.json();
    return { status: res.status, body, retryAfter: res.headers.get('retry-after') };
  }

  function postJson(route: string, payload: unknown) {
    return call(route, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });
  }

  async function uploadImage(): Promise<string> {
    const res = await fetch(`${baseUrl}/api/upload`, {
      method: 'POST',
      headers: { 'Content-Type': 'image/png', 'X-Filename': 'beach.png' },
      body: PNG_BYTES,
    });
    const body: unknown = await res.json();
    if (typeof body !== 'object' || body === null || !('file_id' in body) || typeof body.file_id !== 'string') {
      throw new Error(`Upload failed with ${res.status}`);
    }
    return body.file_id;
  }

  async function submit(fileId: string, prompt = 'sunset'): Promise<string> {
    const { body } = await postJson('/api/generate', {
      model: 'kling_21_pro',
      prompt,
      duration: 5,
      file_id: fileId,
    });
    if (typeof body !== 'object' || body === null || !('job_id' in body) || typeof body.job_id !== 'string') {
      throw new Error('Submit failed');
    }
    return body.job_id;
  }

  function listen(query: string): Promise<SocketTranscript> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(`ws://127.0.0.1:${port}/ws${query}`);
      const messages: unknown[] = [];
      ws.on('message', (data) => messages.push(JSON.parse(String(data))));
      ws.on('close', (code, reason) => resolve({ messages, code, reason: reason.toString() }));
      ws.on('error', reject);
    });
  }

  beforeEach(async () => {
    uploadDir = await mkdtemp(path.join(os.tmpdir(), 'vidgen-web-'));
    provider = new FakeProvider();
    videoStatus = 200;
  });

  afterEach(async () => {
    await server.stop();
    await service.stop();
    await rm(uploadDir, { recursive: true, force: true });
  });

  test('lists the model catalog', async () => {
    await start();
    const { status, body } = await call('/api/models');

    expect(status).toBe(200);
    expect(body).toMatchObject({
      models: expect.arrayContaining([expect.objectContaining({ id: 'kling_21_pro', prices: { '5': 0.45, '10': 0.9 } })]),
    });
  });

  test('accepts a raw image upload', async () => {
    await start();
    const res = await fetch(`${baseUrl}/api/upload`, {
      method: 'POST',
      headers: { 'Content-Type': 'image/png', 'X-Filename': 'beach.png' },
      body: PNG_BYTES,
    });

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({ size: 12, content_type: 'image/png' });
  });

  test('rejects an upload that is not an image body', async () => {
    await start();
    const { status, body } = await postJson('/api/upload', { image: 'nope' });

    expect(status).toBe(400);
    expect(body).toMatchObject({ error: 'invalid_request' });
  });

  test('submits a generation and reports its status', async () => {
    await start();
    const fileId = await uploadImage();
    const { status, body } = await postJson('/api/generate', {
      model: 'kling_21_pro',
      prompt: 'sunset',
      duration: 5,
      file_id: fileId,
    });

    expect(status).toBe(202);
    expect(body).toMatchObject({ status: 'queued', deduplicated: false, cached: false, estimated_cost_usd: 0.45 });

    if (typeof body !== 'object' || body === null || !('job_id' in body) || typeof body.job_id !== 'string') {
      throw new Error('job_id missing');
    }
    await processor.drain();

    const job = await call(`/api/jobs/${body.job_id}`);
    expect(job.status).toBe(200);
    expect(job.body).toMatchObject({ job_id: body.job_id, status: 'completed', progress_percent: 100, result: sampleResult() });

    const list = await call('/api/jobs?status=completed');
    expect(list.body).toMatchObject({ jobs: [expect.objectContaining({ job_id: body.job_id })] });
  });

  test('maps request errors to status codes', async () => {
    await start();

    expect(await call('/api/jobs/missing')).toMatchObject({
      status: 404,
      body: { error: 'not_found', message: 'Job not found: missing' },
    });
    expect(await postJson('/api/generate', {})).toMatchObject({ status: 400, body: { error: 'invalid_request' } });
    expect(await call('/api/jobs?status=sleeping')).toMatchObject({ status: 400, body: { error: 'invalid_request' } });

    const malformed = await call('/api/generate', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"model":',
    });
    expect(malformed).toMatchObject({
      status: 400,
      body: { error: 'invalid_request', message: 'Request body could not be parsed' },
    });
  });

  test('answers 429 with Retry-After once the limit is spent', async () => {
    await start(1);
    const fileId = await uploadImage();
    await submit(fileId);

    const limited = await postJson('/api/generate', { model: 'kling_21_pro', prompt: 'sunset', duration: 5, file_id: fileId });
    expect(limited).toMatchObject({
      status: 429,
      retryAfter: '60',
      body: { error: 'rate_limited', retry_after: 60 },
    });
  });

  test('cancels a queued job', async () => {
    const gate: Deferred<GenerationResult> = deferred();
    provider.setHandler(() => gate.promise);
    await start(100, 1);
    const fileId = await uploadImage();
    await submit(fileId, 'first');
    const queuedId = await submit(fileId, 'second');

    const { status, body } = await call(`/api/jobs/${queuedId}/cancel`, { method: 'POST' });
    expect(status).toBe(200);
    expect(body).toMatchObject({ job_id: queuedId, status: 'cancelled', cancel_outcome: 'cancelled' });

    gate.resolve(sampleResult());
    await processor.drain();
    expect(provider.calls).toBe(1);
  });

  test('downloads a finished video', async () => {
    await start();
    const jobId = await submit(await uploadImage());
    await processor.drain();

    const { status, body } = await call(`/api/jobs/${jobId}/download`, { method: 'POST' });
    expect(status).toBe(201);
    expect(body).toEqual({
      job_id: jobId,
      video_path: path.join(uploadDir, 'outputs', 'videos', `${jobId}.mp4`),
      metadata_path: path.join(uploadDir, 'outputs', 'metadata', `${jobId}.json`),
      size: 5,
      sha256: createHash('sha256').update('video').digest('hex'),
    });
  });

  test('answers 502 when the video cannot be fetched', async () => {
    videoStatus = 500;
    await start();
    const jobId = await submit(await uploadImage());
    await processor.drain();

    expect(await call(`/api/jobs/${jobId}/download`, { method: 'POST' })).toMatchObject({
      status: 502,
      body: { error: 'upstream_failed', message: 'Could not download the video (HTTP 500)' },
    });
  });

  test('validates fingerprints before invalidating the cache', async () => {
    await start();

    expect(await call('/api/cache/xyz', { method: 'DELETE' })).toMatchObject({
      status: 400,
      body: { error: 'invalid_request', message: 'Fingerprint must be 64 lowercase hex characters' },
    });
    expect(await call(`/api/cache/${'b'.repeat(64)}`, { method: 'DELETE' })).toMatchObject({
      status: 200,
      body: { fingerprint: 'b'.repeat(64), invalidated: false },
    });
  });

  test('reports health', async () => {
    await start();
    const { status, body } = await call('/api/health');

    expect(status).toBe(200);
    expect(body).toMatchObject({ status: 'healthy', provider: { healthy: true, circuitBreaker: 'unknown' } });
  });

  describe('progress stream', () => {
    test('closes with a policy error without a job_id', async () => {
      await start();
      const transcript = await listen('');

      expect(transcript.code).toBe(1008);
      expect(transcript.messages).toEqual([{ type: 'error', message: 'job_id query parameter is required' }]);
    });

    test('closes with a policy error for an unknown job', async () => {
      await start();
      const transcript = await listen('?job_id=missing');

      expect(transcript.code).toBe(1008);
      expect(transcript.messages).toEqual([{ type: 'error', message: 'Job not found: missing' }]);
    });

    test('streams progress until the job finishes', async () => {
      const gate: Deferred<GenerationResult> = deferred();
      provider.setHandler(() => gate.promise);
      await start();
      const jobId = await submit(await uploadImage());

      const transcript = listen(`?job_id=${jobId}`);
      setTimeout(() => gate.resolve(sampleResult()), 50);
      const { messages, code, reason } = await transcript;

      expect(code).toBe(1000);
      expect(reason).toBe('Job finished');
      expect(messages[messages.length - 1]).toMatchObject({
        type: 'progress',
        job_id: jobId,
        status: 'completed',
        progress_percent: 100,
        message: 'Video generated successfully',
      });
    });
  });
});
