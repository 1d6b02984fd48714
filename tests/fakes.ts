import { GenerationInput, GenerationResult, JobRequestSummary } from '../src/core/entities/Job.js';
import { ProviderError } from '../src/core/errors.js';
import { IExternalCache } from '../src/core/interfaces/IExternalCache.js';
import { GenerateOptions, IGenerationProvider } from '../src/core/interfaces/IGenerationProvider.js';

export const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d]);

export const SAMPLE_HASH = 'a'.repeat(64);

export function sampleRequest(overrides: Partial<JobRequestSummary> = {}): JobRequestSummary {
  return {
    modelId: 'kling_21_pro',
    prompt: 'sunset over the sea',
    duration: 5,
    aspectRatio: '16:9',
    imageSha256: SAMPLE_HASH,
    ...overrides,
  };
}

export function sampleInput(overrides: Partial<GenerationInput> = {}): GenerationInput {
  return {
    endpoint: 'fal-ai/kling-video/v2.1/pro/image-to-video',
    prompt: 'sunset over the sea',
    duration: 5,
    aspectRatio: '16:9',
    imageDataUri: 'data:image/png;base64,AAAA',
    ...overrides,
  };
}

export function sampleResult(videoUrl = 'https://cdn.example.com/video.mp4'): GenerationResult {
  return { videoUrl, providerRequestId: 'req-1' };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Let pending promise callbacks run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * In-process stand-in for Redis.
 */
export class FakeExternalCache implements IExternalCache {
  store: Map<string, { value: string; ttlSeconds: number }> = new Map();
  failing = false;
  calls = { get: 0, set: 0, delete: 0 };

  async get(key: string): Promise<string | null> {
    this.calls.get++;
    this.failIfDown();
    return this.store.get(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.calls.set++;
    this.failIfDown();
    this.store.set(key, { value, ttlSeconds });
  }

  async delete(key: string): Promise<void> {
    this.calls.delete++;
    this.failIfDown();
    this.store.delete(key);
  }

  async ping(): Promise<boolean> {
    return !this.failing;
  }

  async close(): Promise<void> {}

  private failIfDown(): void {
    if (this.failing) {
      throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
    }
  }
}

type GenerateHandler = (input: GenerationInput, options: GenerateOptions, call: number) => Promise<GenerationResult>;

/**
 * Scriptable provider. Each call is answered by `handler`; the default
 * succeeds at once.
 */
export class FakeProvider implements IGenerationProvider {
  calls = 0;
  inputs: GenerationInput[] = [];
  healthy = true;

  constructor(private handler: GenerateHandler = async () => sampleResult()) {}

  setHandler(handler: GenerateHandler): void {
    this.handler = handler;
  }

  async generate(input: GenerationInput, options: GenerateOptions): Promise<GenerationResult> {
    this.calls++;
    this.inputs.push(input);
    return this.handler(input, options, this.calls);
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }
}

/** Provider call that only ends when its signal aborts. */
export function hangUntilAborted(_input: GenerationInput, options: GenerateOptions): Promise<GenerationResult> {
  return new Promise((_, reject) => {
    options.signal.addEventListener('abort', () => reject(options.signal.reason), { once: true });
  });
}

export function clientError(message: string): ProviderError {
  return new ProviderError('client', message, 422);
}
