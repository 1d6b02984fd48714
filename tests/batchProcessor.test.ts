import { GenerationResult, ProgressEvent } from '../src/core/entities/Job.js';
import { BackpressureError, InvalidTransitionError, ProviderError } from '../src/core/errors.js';
import { CacheStore } from '../src/infrastructure/cache/CacheStore.js';
import { ProgressPublisher, ProgressSubscription } from '../src/infrastructure/progress/ProgressPublisher.js';
import { BatchProcessor, BatchProcessorOptions } from '../src/infrastructure/queue/BatchProcessor.js';
import { JobRegistry } from '../src/infrastructure/queue/JobRegistry.js';
import {
  Deferred,
  FakeProvider,
  clientError,
  deferred,
  flush,
  hangUntilAborted,
  sampleInput,
  sampleRequest,
  sampleResult,
} from './fakes.js';

function fingerprint(n: number): string {
  return n.toString(16).padStart(64, '0');
}

async function collect(subscription: ProgressSubscription): Promise<ProgressEvent[]> {
  const events: ProgressEvent[] = [];
  for await (const event of subscription) {
    events.push(event);
  }
  return events;
}

describe('BatchProcessor', () => {
  let registry: JobRegistry;
  let provider: FakeProvider;
  let cache: CacheStore;
  let publisher: ProgressPublisher;
  let onFatal: jest.Mock;

  function createProcessor(options: Partial<BatchProcessorOptions> = {}): BatchProcessor {
    return new BatchProcessor(registry, provider, cache, publisher, {
      maxConcurrency: 2,
      maxQueueSize: 10,
      cacheTtlSeconds: 60,
      retry: { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 10, multiplier: 2, timeoutMs: 1000, jitter: false },
      sleep: async () => undefined,
      onFatal,
      ...options,
    });
  }

  function submit(processor: BatchProcessor, n: number, prompt = `prompt ${n}`): string {
    const job = registry.create(fingerprint(n), sampleRequest({ prompt }), 0.45);
    processor.enqueue(job.id, sampleInput({ prompt }));
    return job.id;
  }

  beforeEach(() => {
    let next = 0;
    registry = new JobRegistry({ idFactory: () => `job-${++next}` });
    provider = new FakeProvider();
    cache = new CacheStore(null);
    publisher = new ProgressPublisher();
    onFatal = jest.fn();
  });

  test('runs a job to completion and caches the result', async () => {
    const processor = createProcessor();
    const jobId = submit(processor, 1);
    await processor.drain();

    expect(registry.require(jobId)).toMatchObject({
      status: 'completed',
      progress: 100,
      attemptCount: 1,
      result: sampleResult(),
    });
    expect((await cache.get(fingerprint(1)))?.result).toEqual(sampleResult());
    expect(processor.getStatistics()).toMatchObject({ completed: 1, providerCalls: 1, active: 0, queued: 0 });
  });

  test('never runs more provider calls than the concurrency limit', async () => {
    const gates: Deferred<GenerationResult>[] = [];
    provider.setHandler(() => {
      const gate = deferred<GenerationResult>();
      gates.push(gate);
      return gate.promise;
    });
    const processor = createProcessor({ maxConcurrency: 2 });

    const jobIds = [1, 2, 3, 4, 5].map((n) => submit(processor, n));
    await flush();
    expect(provider.calls).toBe(2);
    expect(processor.getStatistics()).toMatchObject({ active: 2, queued: 3 });

    let released = 0;
    while (released < jobIds.length) {
      await flush();
      const pending = gates.slice(released);
      released = gates.length;
      pending.forEach((gate) => gate.resolve(sampleResult()));
    }
    await processor.drain();

    expect(processor.getStatistics().peakConcurrency).toBe(2);
    expect(jobIds.map((id) => registry.require(id).status)).toEqual(Array(5).fill('completed'));
  });

  test('starts work in submission order', async () => {
    const processor = createProcessor({ maxConcurrency: 1 });
    submit(processor, 1, 'first');
    submit(processor, 2, 'second');
    submit(processor, 3, 'third');
    await processor.drain();

    expect(provider.inputs.map((input) => input.prompt)).toEqual(['first', 'second', 'third']);
  });

  test('refuses work beyond the queue limit', async () => {
    const gate = deferred<GenerationResult>();
    provider.setHandler(() => gate.promise);
    const processor = createProcessor({ maxConcurrency: 1, maxQueueSize: 1 });
    submit(processor, 1);
    submit(processor, 2);

    expect(processor.hasCapacity()).toBe(false);
    expect(() => submit(processor, 3)).toThrow(BackpressureError);

    gate.resolve(sampleResult());
    await processor.drain();
    expect(processor.getStatistics().completed).toBe(2);
  });

  test('retries transient failures and reports the retry', async () => {
    provider.setHandler(async (_input, _options, call) => {
      if (call === 1) throw new ProviderError('server', 'Provider hiccup', 502);
      return sampleResult();
    });
    const processor = createProcessor();
    const job = registry.create(fingerprint(1), sampleRequest(), 0.45);
    const events = collect(publisher.subscribe(job.id));

    processor.enqueue(job.id, sampleInput());
    await processor.drain();

    expect(registry.require(job.id)).toMatchObject({ status: 'completed', attemptCount: 2 });
    expect((await events).map((event) => event.message)).toEqual([
      'Queued for generation',
      'Generation started',
      'Retrying generation (attempt 2/3)',
      'Video generated successfully',
    ]);
  });

  test('fails at once on a non-retryable provider error', async () => {
    provider.setHandler(async () => {
      throw clientError('Prompt rejected by content policy');
    });
    const processor = createProcessor();
    const jobId = submit(processor, 1);
    await processor.drain();

    expect(provider.calls).toBe(1);
    expect(registry.require(jobId)).toMatchObject({
      status: 'failed',
      error: 'Prompt rejected by content policy',
    });
    expect(await cache.get(fingerprint(1))).toBeNull();
  });

  test('fails after every attempt timed out and caches nothing', async () => {
    provider.setHandler(hangUntilAborted);
    const processor = createProcessor({
      retry: { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 10, multiplier: 2, timeoutMs: 20, jitter: false },
    });
    const jobId = submit(processor, 1);
    await processor.drain();

    expect(provider.calls).toBe(3);
    expect(registry.require(jobId)).toMatchObject({
      status: 'failed',
      attemptCount: 3,
      error: 'Generation failed after 3 attempts: The video provider did not answer in time',
    });
    expect(await cache.get(fingerprint(1))).toBeNull();
    expect(processor.getStatistics().failed).toBe(1);
  });

  test('a job cancelled while queued never reaches the provider', async () => {
    const gate = deferred<GenerationResult>();
    provider.setHandler(() => gate.promise);
    const processor = createProcessor({ maxConcurrency: 1 });

    const first = submit(processor, 1);
    const second = submit(processor, 2);
    expect(registry.requestCancel(second).outcome).toBe('cancelled');

    gate.resolve(sampleResult());
    await processor.drain();

    expect(provider.calls).toBe(1);
    expect(registry.require(first).status).toBe('completed');
    expect(registry.require(second).status).toBe('cancelled');
    expect(processor.getStatistics().skipped).toBe(1);
  });

  test('a job cancelled while running keeps the billed result in the cache', async () => {
    const gate = deferred<GenerationResult>();
    provider.setHandler(() => gate.promise);
    const processor = createProcessor();

    const jobId = submit(processor, 1);
    await flush();
    expect(registry.requestCancel(jobId).outcome).toBe('pending');

    gate.resolve(sampleResult());
    await processor.drain();

    expect(registry.require(jobId)).toMatchObject({
      status: 'cancelled',
      message: 'Cancelled; the finished video was cached',
    });
    expect((await cache.get(fingerprint(1)))?.result).toEqual(sampleResult());
  });

  test('no retry starts after cancellation', async () => {
    const gate = deferred<GenerationResult>();
    provider.setHandler(() => gate.promise);
    const processor = createProcessor();

    const jobId = submit(processor, 1);
    await flush();
    registry.requestCancel(jobId);
    gate.reject(new ProviderError('server', 'Provider hiccup', 503));
    await processor.drain();

    expect(provider.calls).toBe(1);
    expect(registry.require(jobId)).toMatchObject({ status: 'cancelled', message: 'Job cancelled' });
  });

  test('published progress never goes backwards', async () => {
    provider.setHandler(async (_input, options) => {
      options.onProgress?.(10, 'Waiting in provider queue');
      options.onProgress?.(30, 'Generating video');
      options.onProgress?.(20, 'Late report');
      options.onProgress?.(30, 'Generating video');
      options.onProgress?.(60, 'Almost there');
      return sampleResult();
    });
    const processor = createProcessor();
    const job = registry.create(fingerprint(1), sampleRequest(), 0.45);
    const events = collect(publisher.subscribe(job.id));

    processor.enqueue(job.id, sampleInput());
    await processor.drain();

    expect((await events).map((event) => event.progress)).toEqual([0, 0, 10, 30, 60, 100]);
  });

  test('an illegal transition is escalated as fatal', async () => {
    const gate = deferred<GenerationResult>();
    provider.setHandler(() => gate.promise);
    const processor = createProcessor();

    const jobId = submit(processor, 1);
    await flush();
    // Something outside the worker settles the job behind its back
    registry.transition(jobId, 'failed');
    gate.resolve(sampleResult());
    await processor.drain();

    expect(onFatal).toHaveBeenCalledTimes(1);
    expect(onFatal.mock.calls[0][0]).toBeInstanceOf(InvalidTransitionError);
  });
});
