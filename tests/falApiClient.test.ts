import { Headers, RequestInit, Response } from 'node-fetch';
import { CancelledError, ProviderError } from '../src/core/errors.js';
import { FalApiClient, FetchFn } from '../src/infrastructure/http/FalApiClient.js';
import { CircuitBreaker } from '../src/utils/retry.js';
import { deferred, sampleInput } from './fakes.js';

const QUEUE = 'https://queue.test';
const ENDPOINT = 'fal-ai/kling-video/v2.1/pro/image-to-video';
const REQUEST_BASE = `${QUEUE}/${ENDPOINT}/requests/req-42`;

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

interface RecordedCall {
  url: string;
  init?: RequestInit;
}

/**
 * Answers each URL with the next scripted response.
 */
function scriptedFetch(routes: Record<string, Array<() => Response>>): { fetchFn: FetchFn; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchFn: FetchFn = async (url, init) => {
    calls.push({ url, init });
    const next = routes[url]?.shift();
    if (!next) {
      throw new Error(`Unexpected request to ${url}`);
    }
    return next();
  };
  return { fetchFn, calls };
}

function createClient(fetchFn: FetchFn, circuitBreaker?: CircuitBreaker): FalApiClient {
  return new FalApiClient({ apiKey: 'test-secret', queueUrl: `${QUEUE}/`, pollIntervalMs: 1, fetchFn, circuitBreaker });
}

async function providerError(promise: Promise<unknown>): Promise<ProviderError> {
  const error = await promise.then(
    () => null,
    (caught: unknown) => caught
  );
  if (!(error instanceof ProviderError)) {
    throw new Error(`Expected a ProviderError, got ${String(error)}`);
  }
  return error;
}

describe('FalApiClient', () => {
  test('submits, polls until completion and fetches the video', async () => {
    const { fetchFn, calls } = scriptedFetch({
      [`${QUEUE}/${ENDPOINT}`]: [() => json({ request_id: 'req-42' })],
      [`${REQUEST_BASE}/status?logs=1`]: [
        () => json({ status: 'IN_QUEUE', queue_position: 2 }),
        () => json({ status: 'IN_PROGRESS', logs: [{ message: 'Loading model' }, { message: 'Rendering frames' }] }),
        () => json({ status: 'IN_PROGRESS', logs: null }),
        () => json({ status: 'COMPLETED' }),
      ],
      [REQUEST_BASE]: [
        () => json({ video: { url: 'https://cdn.test/out.mp4', content_type: 'video/mp4', file_size: 1024 }, seed: 7 }),
      ],
    });
    const progress: Array<[number, string]> = [];

    const result = await createClient(fetchFn).generate(sampleInput(), {
      signal: new AbortController().signal,
      onProgress: (percentage, message) => progress.push([percentage, message]),
    });

    expect(result).toEqual({
      videoUrl: 'https://cdn.test/out.mp4',
      providerRequestId: 'req-42',
      seed: 7,
      contentType: 'video/mp4',
      fileSize: 1024,
    });
    expect(progress).toEqual([
      [5, 'Submitting request to provider'],
      [10, 'Waiting in provider queue (position 2)'],
      [20, 'Rendering frames'],
      [25, 'Generating video'],
      [95, 'Fetching generated video'],
    ]);

    const submit = calls[0];
    expect(submit.init?.method).toBe('POST');
    expect(new Headers(submit.init?.headers).get('authorization')).toBe('Key test-secret');
    expect(JSON.parse(String(submit.init?.body))).toEqual({
      prompt: 'sunset over the sea',
      image_url: 'data:image/png;base64,AAAA',
      duration: '5',
      aspect_ratio: '16:9',
    });
  });

  test('passes optional arguments and follows the URLs the provider returns', async () => {
    const { fetchFn, calls } = scriptedFetch({
      [`${QUEUE}/${ENDPOINT}`]: [
        () =>
          json({
            request_id: 'req-7',
            status_url: 'https://status.test/req-7',
            response_url: 'https://status.test/req-7/result',
          }),
      ],
      ['https://status.test/req-7?logs=1']: [() => json({ status: 'COMPLETED' })],
      ['https://status.test/req-7/result']: [() => json({ video: { url: 'https://cdn.test/7.mp4' } })],
    });

    const result = await createClient(fetchFn).generate(
      sampleInput({ negativePrompt: 'blur', cfgScale: 0.4 }),
      { signal: new AbortController().signal }
    );

    expect(result.videoUrl).toBe('https://cdn.test/7.mp4');
    expect(JSON.parse(String(calls[0].init?.body))).toMatchObject({ negative_prompt: 'blur', cfg_scale: 0.4 });
  });

  test('maps a rejected request to a non-retryable client error', async () => {
    const { fetchFn } = scriptedFetch({
      [`${QUEUE}/${ENDPOINT}`]: [() => json({ detail: [{ msg: 'prompt too long' }, { msg: 'bad ratio' }] }, 422)],
    });

    const error = await providerError(createClient(fetchFn).generate(sampleInput(), { signal: new AbortController().signal }));
    expect(error.kind).toBe('client');
    expect(error.userMessage).toBe('prompt too long; bad ratio');
    expect(error.statusCode).toBe(422);
    expect(error.retryable).toBe(false);
  });

  test('maps server errors and rate limiting to retryable errors', async () => {
    const { fetchFn } = scriptedFetch({
      [`${QUEUE}/${ENDPOINT}`]: [
        () => new Response('upstream exploded', { status: 502 }),
        () => json({ detail: 'slow down' }, 429),
      ],
    });
    const client = createClient(fetchFn);
    const signal = new AbortController().signal;

    const first = await providerError(client.generate(sampleInput(), { signal }));
    expect(first).toMatchObject({ kind: 'server', userMessage: 'upstream exploded', statusCode: 502 });

    const second = await providerError(client.generate(sampleInput(), { signal }));
    expect(second).toMatchObject({ kind: 'server', userMessage: 'slow down', statusCode: 429 });
  });

  test('reports an unreachable provider as a network error', async () => {
    const fetchFn: FetchFn = async () => {
      throw new Error('getaddrinfo ENOTFOUND queue.test');
    };

    const error = await providerError(createClient(fetchFn).generate(sampleInput(), { signal: new AbortController().signal }));
    expect(error.kind).toBe('network');
    expect(error.userMessage).toBe('Could not reach the video provider');
  });

  test('rejects malformed responses and unknown statuses', async () => {
    const { fetchFn } = scriptedFetch({
      [`${QUEUE}/${ENDPOINT}`]: [() => json({ id: 'no-request-id' }), () => json({ request_id: 'req-42' })],
      [`${REQUEST_BASE}/status?logs=1`]: [() => json({ status: 'EXPLODED' })],
    });
    const client = createClient(fetchFn);
    const signal = new AbortController().signal;

    expect((await providerError(client.generate(sampleInput(), { signal }))).userMessage).toBe(
      'Provider returned an unexpected submit response'
    );
    expect((await providerError(client.generate(sampleInput(), { signal }))).userMessage).toBe(
      'Provider reported unexpected status EXPLODED'
    );
  });

  test('stops before submitting when the signal is already aborted', async () => {
    const { fetchFn, calls } = scriptedFetch({});
    const controller = new AbortController();
    const reason = new CancelledError('stop');
    controller.abort(reason);

    await expect(createClient(fetchFn).generate(sampleInput(), { signal: controller.signal })).rejects.toBe(reason);
    expect(calls).toHaveLength(0);
  });

  test('aborts a request in progress when the signal fires', async () => {
    const started = deferred<void>();
    const signals: unknown[] = [];
    const fetchFn: FetchFn = (url, init) => {
      signals.push(init?.signal);
      started.resolve();
      return new Promise((_, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('The user aborted a request.')));
      });
    };
    const controller = new AbortController();
    const reason = new CancelledError('deadline passed');

    const pending = createClient(fetchFn).generate(sampleInput(), { signal: controller.signal });
    await started.promise;
    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
    expect(signals).toHaveLength(1);
    expect(signals[0]).toBe(controller.signal);
  });

  test('opens the circuit after repeated provider failures', async () => {
    const { fetchFn } = scriptedFetch({
      [`${QUEUE}/${ENDPOINT}`]: [() => json({}, 503), () => json({}, 503)],
    });
    const client = createClient(fetchFn, new CircuitBreaker(2, 60000));
    const signal = new AbortController().signal;

    await providerError(client.generate(sampleInput(), { signal }));
    await providerError(client.generate(sampleInput(), { signal }));
    expect(client.getCircuitBreakerState()).toBe('open');
    expect(await client.healthCheck()).toBe(false);

    const blocked = await providerError(client.generate(sampleInput(), { signal }));
    expect(blocked.kind).toBe('circuit_open');
  });

  test('health check needs an API key', async () => {
    const { fetchFn } = scriptedFetch({});
    expect(await createClient(fetchFn).healthCheck()).toBe(true);
    expect(await new FalApiClient({ apiKey: '', fetchFn }).healthCheck()).toBe(false);
  });
});
