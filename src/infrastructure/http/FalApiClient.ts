import fetch, { RequestInit, Response } from 'node-fetch';
import { z } from 'zod';
import { GenerationInput, GenerationResult } from '../../core/entities/Job.js';
import { CancelledError, ProviderError } from '../../core/errors.js';
import { GenerateOptions, IGenerationProvider, ProgressCallback } from '../../core/interfaces/IGenerationProvider.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { CircuitBreaker } from '../../utils/retry.js';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface FalApiClientOptions {
  apiKey: string;
  queueUrl?: string;
  pollIntervalMs?: number;
  fetchFn?: FetchFn;
  circuitBreaker?: CircuitBreaker;
  logger?: Logger;
}

const SubmitResponseSchema = z.object({
  request_id: z.string().min(1),
  status_url: z.string().url().optional(),
  response_url: z.string().url().optional(),
});

const StatusResponseSchema = z.object({
  status: z.string(),
  queue_position: z.number().optional(),
  logs: z.array(z.object({ message: z.string() })).nullish(),
});

const VideoResponseSchema = z.object({
  video: z.object({
    url: z.string().url(),
    content_type: z.string().optional(),
    file_size: z.number().optional(),
  }),
  seed: z.number().optional(),
});

const ErrorBodySchema = z.object({
  detail: z.union([z.string(), z.array(z.object({ msg: z.string() }))]),
});

/**
 * Client for the fal.ai queue API.
 *
 * A generation is submitted once, then its status is polled until the
 * provider reports completion and the video description is fetched. The
 * signal aborts the HTTP request in progress and stops polling, but the
 * submitted request keeps running (and billing) on the provider side.
 */
export class FalApiClient implements IGenerationProvider {
  private readonly apiKey: string;
  private readonly queueUrl: string;
  private readonly pollIntervalMs: number;
  private readonly fetchFn: FetchFn;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly logger: Logger;

  constructor(options: FalApiClientOptions) {
    this.apiKey = options.apiKey;
    this.queueUrl = (options.queueUrl ?? 'https://queue.fal.run').replace(/\/+$/, '');
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.fetchFn = options.fetchFn ?? fetch;
    this.circuitBreaker = options.circuitBreaker || new CircuitBreaker(5, 60000);
    this.logger = options.logger ?? silentLogger;
  }

  async generate(input: GenerationInput, options: GenerateOptions): Promise<GenerationResult> {
    return this.circuitBreaker.execute(() => this.run(input, options.signal, options.onProgress));
  }

  async healthCheck(): Promise<boolean> {
    return this.apiKey.length > 0 && this.circuitBreaker.getState() !== 'open';
  }

  getCircuitBreakerState() {
    return this.circuitBreaker.getState();
  }

  private async run(
    input: GenerationInput,
    signal: AbortSignal,
    onProgress: ProgressCallback = () => undefined
  ): Promise<GenerationResult> {
    throwIfAborted(signal);
    onProgress(5, 'Submitting request to provider');

    const submitted = parseOrThrow(
      SubmitResponseSchema,
      await this.request('POST', `${this.queueUrl}/${input.endpoint}`, signal, buildArguments(input)),
      'submit'
    );
    const requestBase = `${this.queueUrl}/${input.endpoint}/requests/${submitted.request_id}`;
    const statusUrl = submitted.status_url ?? `${requestBase}/status`;
    const responseUrl = submitted.response_url ?? requestBase;
    this.logger.debug(`Submitted ${input.endpoint} request ${submitted.request_id}`);

    let runningProgress = 20;
    for (;;) {
      throwIfAborted(signal);
      const status = parseOrThrow(
        StatusResponseSchema,
        await this.request('GET', `${statusUrl}?logs=1`, signal),
        'status'
      );

      if (status.status === 'COMPLETED') {
        break;
      }
      if (status.status === 'IN_QUEUE') {
        onProgress(
          10,
          status.queue_position !== undefined
            ? `Waiting in provider queue (position ${status.queue_position})`
            : 'Waiting in provider queue'
        );
      } else if (status.status === 'IN_PROGRESS') {
        const logs = status.logs ?? [];
        const lastLog = logs.length > 0 ? logs[logs.length - 1].message : 'Generating video';
        onProgress(runningProgress, lastLog);
        runningProgress = Math.min(90, runningProgress + 5);
      } else {
        throw new ProviderError('server', `Provider reported unexpected status ${status.status}`);
      }

      await waitOrAbort(this.pollIntervalMs, signal);
    }

    throwIfAborted(signal);
    onProgress(95, 'Fetching generated video');
    const output = parseOrThrow(VideoResponseSchema, await this.request('GET', responseUrl, signal), 'result');

    return {
      videoUrl: output.video.url,
      providerRequestId: submitted.request_id,
      seed: output.seed,
      contentType: output.video.content_type,
      fileSize: output.video.file_size,
    };
  }

  private async request(method: 'GET' | 'POST', url: string, signal: AbortSignal, body?: object): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers: {
          Authorization: `Key ${this.apiKey}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal,
      });
    } catch (error) {
      throwIfAborted(signal);
      throw new ProviderError('network', 'Could not reach the video provider', undefined, { cause: error });
    }

    if (!response.ok) {
      const detail = await readErrorDetail(response);
      const retryable = response.status >= 500 || response.status === 429 || response.status === 408;
      throw new ProviderError(
        retryable ? 'server' : 'client',
        detail ?? `Provider answered HTTP ${response.status}`,
        response.status
      );
    }

    try {
      const data: unknown = await response.json();
      return data;
    } catch (error) {
      throwIfAborted(signal);
      throw new ProviderError('server', 'Provider returned an unreadable response', response.status, {
        cause: error,
      });
    }
  }
}

function buildArguments(input: GenerationInput): Record<string, string | number> {
  const args: Record<string, string | number> = {
    prompt: input.prompt,
    image_url: input.imageDataUri,
    duration: String(input.duration),
    aspect_ratio: input.aspectRatio,
  };
  if (input.negativePrompt) {
    args.negative_prompt = input.negativePrompt;
  }
  if (input.cfgScale !== undefined) {
    args.cfg_scale = input.cfgScale;
  }
  return args;
}

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, stage: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new ProviderError('server', `Provider returned an unexpected ${stage} response`);
  }
  return parsed.data;
}

async function readErrorDetail(response: Response): Promise<string | null> {
  let text: string;
  try {
    text = await response.text();
  } catch {
    return null;
  }

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return text.trim() ? text.trim().slice(0, 300) : null;
  }

  const parsed = ErrorBodySchema.safeParse(body);
  if (!parsed.success) return null;
  const { detail } = parsed.data;
  return typeof detail === 'string' ? detail : detail.map((item) => item.msg).join('; ');
}

function throwIfAborted(signal: AbortSignal): void {
  if (!signal.aborted) return;
  const reason: unknown = signal.reason;
  throw reason instanceof Error ? reason : new CancelledError('Provider call aborted');
}

function waitOrAbort(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}
