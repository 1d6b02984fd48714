import { z } from 'zod';
import {
  GenerationInput,
  JobRequestSummary,
  JobStatus,
  JobStatusView,
  isTerminal,
  toProgressEvent,
  toStatusView,
} from '../../core/entities/Job.js';
import { ASPECT_RATIOS, MODEL_CATALOG, MODEL_IDS, ModelId, estimateCost } from '../../core/entities/Model.js';
import { RouteClass } from '../../core/entities/RateLimit.js';
import { BackpressureError, RateLimitedError, ValidationError } from '../../core/errors.js';
import { IGenerationProvider } from '../../core/interfaces/IGenerationProvider.js';
import { CacheStore } from '../../infrastructure/cache/CacheStore.js';
import { AsyncFileManager, StoredUpload } from '../../infrastructure/files/AsyncFileManager.js';
import { ArchivedResult, ResultArchiver } from '../../infrastructure/files/ResultArchiver.js';
import { ProgressPublisher, ProgressSubscription, SubscribeOptions } from '../../infrastructure/progress/ProgressPublisher.js';
import { BatchProcessor } from '../../infrastructure/queue/BatchProcessor.js';
import { CancelOutcome, JobRegistry } from '../../infrastructure/queue/JobRegistry.js';
import { RateLimiter } from '../../infrastructure/ratelimit/RateLimiter.js';
import { detectImageType, toDataUri } from '../../utils/imageValidation.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { findPromptProblem } from '../../utils/promptValidation.js';
import { FingerprintKeyBuilder, normalizeText } from './FingerprintKeyBuilder.js';

function refinePromptContent(label: string) {
  return (value: string, ctx: z.RefinementCtx) => {
    const problem = findPromptProblem(value);
    if (problem) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} ${problem}` });
    }
  };
}

export const GenerateRequestSchema = z
  .object({
    model: z
      .string()
      .transform((value) => value.trim().toLowerCase())
      .pipe(z.enum(MODEL_IDS)),
    prompt: z
      .string()
      .trim()
      .min(1, 'Prompt must not be empty')
      .max(2000, 'Prompt is limited to 2000 characters')
      .superRefine(refinePromptContent('Prompt')),
    negative_prompt: z
      .string()
      .trim()
      .max(2000, 'Negative prompt is limited to 2000 characters')
      .superRefine(refinePromptContent('Negative prompt'))
      .optional(),
    duration: z.coerce.number().int('Duration must be a whole number of seconds'),
    aspect_ratio: z
      .string()
      .transform((value) => value.trim())
      .pipe(z.enum(ASPECT_RATIOS)),
    cfg_scale: z.number().min(0).max(1).optional(),
    file_id: z.string().min(1, 'file_id is required'),
  })
  .superRefine((value, ctx) => {
    const model = MODEL_CATALOG[value.model];
    if (!model.durations.includes(value.duration)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['duration'],
        message: `${model.name} supports durations of ${model.durations.join(' or ')} seconds`,
      });
    }
  });

export type GenerateRequest = z.infer<typeof GenerateRequestSchema>;

export interface SubmitResult {
  jobId: string;
  status: JobStatus;
  fingerprint: string;
  deduplicated: boolean;
  cached: boolean;
  estimatedCostUsd: number;
}

export interface GenerationServiceDeps {
  registry: JobRegistry;
  processor: BatchProcessor;
  cache: CacheStore;
  rateLimiter: RateLimiter;
  publisher: ProgressPublisher;
  files: AsyncFileManager;
  archiver: ResultArchiver;
  fingerprints: FingerprintKeyBuilder;
  provider: IGenerationProvider;
}

export interface GenerationServiceOptions {
  jobRetentionMs: number;
  gcIntervalMs: number;
  now: () => number;
  logger: Logger;
}

const FINGERPRINT_PATTERN = /^[0-9a-f]{64}$/;

/**
 * Entry point for every caller (HTTP, WebSocket, MCP).
 *
 * Admission runs rate limiting, validation and input staging first; only
 * then is the request matched against the cache and the in-flight jobs and
 * finally handed to the batch processor. Everything after the cache lookup
 * runs without yielding, so two identical submissions can never both create
 * a job.
 */
export class GenerationService {
  private readonly options: GenerationServiceOptions;
  private gcTimer: NodeJS.Timeout | null = null;

  constructor(
    private deps: GenerationServiceDeps,
    options: Partial<GenerationServiceOptions> = {}
  ) {
    this.options = {
      jobRetentionMs: 60 * 60 * 1000,
      gcIntervalMs: 60 * 1000,
      now: Date.now,
      logger: silentLogger,
      ...options,
    };
  }

  async submit(identity: string, raw: unknown): Promise<SubmitResult> {
    this.admit(identity, 'generate');
    const request = this.validate(raw);
    const { summary, input } = await this.stageInput(request);

    const { registry, processor, cache, fingerprints, publisher } = this.deps;
    const fingerprint = fingerprints.build(summary);
    const estimatedCostUsd = estimateCost(summary.modelId, summary.duration);

    const cached = await cache.get(fingerprint);

    // No awaits below this point
    if (cached) {
      const job = registry.createCompleted(fingerprint, summary, cached.result, estimatedCostUsd);
      publisher.publish(job.id, toProgressEvent(job));
      publisher.complete(job.id);
      this.options.logger.info(`Cache hit for ${fingerprint.slice(0, 12)}, job ${job.id}`);
      return { jobId: job.id, status: job.status, fingerprint, deduplicated: false, cached: true, estimatedCostUsd };
    }

    const inFlight = registry.findInFlight(fingerprint);
    if (inFlight) {
      const job = registry.attach(inFlight.id);
      this.options.logger.info(`Attached request to in-flight job ${job.id} (${job.attachedRequests} callers)`);
      return { jobId: job.id, status: job.status, fingerprint, deduplicated: true, cached: false, estimatedCostUsd };
    }

    if (!processor.hasCapacity()) {
      const stats = processor.getStatistics();
      throw new BackpressureError(stats.queued, stats.maxQueueSize);
    }

    const job = registry.create(fingerprint, summary, estimatedCostUsd);
    processor.enqueue(job.id, input);
    this.options.logger.info(`Job ${job.id} queued for ${summary.modelId} (est. $${estimatedCostUsd.toFixed(2)})`);

    return { jobId: job.id, status: job.status, fingerprint, deduplicated: false, cached: false, estimatedCostUsd };
  }

  async uploadImage(identity: string, bytes: Uint8Array, originalName: string): Promise<StoredUpload> {
    this.admit(identity, 'upload');
    return this.deps.files.storeUpload(bytes, originalName);
  }

  getStatus(identity: string, jobId: string): JobStatusView {
    this.admit(identity, 'api');
    return toStatusView(this.deps.registry.require(jobId));
  }

  listJobs(identity: string, status?: JobStatus): JobStatusView[] {
    this.admit(identity, 'api');
    return this.deps.registry.list(status).map(toStatusView);
  }

  cancel(identity: string, jobId: string): { job: JobStatusView; outcome: CancelOutcome } {
    this.admit(identity, 'api');
    const { job, outcome } = this.deps.registry.requestCancel(jobId);

    if (outcome === 'cancelled') {
      this.deps.processor.discard(job.id);
      this.deps.publisher.publish(job.id, toProgressEvent(job));
      this.deps.publisher.complete(job.id);
    }
    this.options.logger.info(`Cancel requested for job ${jobId}: ${outcome}`);
    return { job: toStatusView(job), outcome };
  }

  /**
   * Progress feed for a job. Throws JobNotFoundError for unknown ids.
   */
  subscribe(jobId: string, options?: SubscribeOptions): ProgressSubscription {
    const job = this.deps.registry.require(jobId);
    const { publisher } = this.deps;
    // Jobs restored from the database never went through the publisher
    if (isTerminal(job.status) && !publisher.getLatest(jobId)) {
      publisher.publish(jobId, toProgressEvent(job));
      publisher.complete(jobId);
    }
    return publisher.subscribe(jobId, options);
  }

  /**
   * Save the finished video of a completed job, with its metadata, under the
   * output directory.
   */
  async downloadResult(identity: string, jobId: string): Promise<ArchivedResult> {
    this.admit(identity, 'api');
    return this.deps.archiver.archive(this.deps.registry.require(jobId));
  }

  async invalidateCache(identity: string, fingerprint: string): Promise<boolean> {
    this.admit(identity, 'api');
    if (!FINGERPRINT_PATTERN.test(fingerprint)) {
      throw new ValidationError('Fingerprint must be 64 lowercase hex characters');
    }
    const removed = await this.deps.cache.invalidate(fingerprint);
    this.options.logger.info(`Cache entry ${fingerprint.slice(0, 12)} invalidated (${removed ? 'was present' : 'not cached locally'})`);
    return removed;
  }

  getModels() {
    return MODEL_IDS.map((id) => {
      const model = MODEL_CATALOG[id];
      return {
        id,
        name: model.name,
        tier: model.tier,
        durations: model.durations,
        max_duration: model.maxDuration,
        cost_per_second: model.costPerSecond,
        prices: Object.fromEntries(model.durations.map((duration) => [String(duration), estimateCost(id, duration)])),
      };
    });
  }

  async getHealth() {
    const { cache, processor, registry, rateLimiter, publisher, provider } = this.deps;
    const providerHealthy = await provider.healthCheck();
    const externalCache = await cache.checkExternal();
    const cacheStats = cache.getStats();

    return {
      status: providerHealthy && externalCache !== 'down' ? 'healthy' : 'degraded',
      provider: {
        healthy: providerHealthy,
        circuitBreaker: provider.getCircuitBreakerState?.() ?? 'unknown',
      },
      cache: cacheStats,
      queue: processor.getStatistics(),
      jobs: registry.getStatistics(),
      rateLimiter: rateLimiter.getStatistics(),
      progress: publisher.getStatistics(),
    };
  }

  start(): void {
    if (this.gcTimer) return;
    this.gcTimer = setInterval(() => {
      this.collectGarbage().catch((error: unknown) => {
        this.options.logger.error('Garbage collection failed:', error);
      });
    }, this.options.gcIntervalMs);
    this.gcTimer.unref();
  }

  async stop(): Promise<void> {
    if (this.gcTimer) {
      clearInterval(this.gcTimer);
      this.gcTimer = null;
    }
    await this.deps.processor.drain();
  }

  /**
   * Evict finished jobs past the retention period, then delete uploads and
   * archived outputs that are older than it.
   */
  async collectGarbage(): Promise<{ jobs: number; files: number }> {
    const { registry, publisher, files, archiver } = this.deps;
    const evicted = registry.gc(this.options.jobRetentionMs);
    publisher.forget(evicted);

    const cutoff = this.options.now() - this.options.jobRetentionMs;
    const uploads = await files.sweepUploads(cutoff);
    const outputs = await archiver.sweep(cutoff);

    if (evicted.length + uploads.length + outputs > 0) {
      this.options.logger.debug(
        `Collected ${evicted.length} job(s), ${uploads.length} upload(s) and ${outputs} output file(s)`
      );
    }
    return { jobs: evicted.length, files: uploads.length + outputs };
  }

  private admit(identity: string, routeClass: RouteClass): void {
    const decision = this.deps.rateLimiter.admit(identity, routeClass);
    if (!decision.allowed) {
      throw new RateLimitedError(decision.retryAfterSeconds);
    }
  }

  private validate(raw: unknown): GenerateRequest {
    const parsed = GenerateRequestSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.errors.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`);
      throw new ValidationError(`Invalid generation request: ${issues.join('; ')}`, issues);
    }
    return parsed.data;
  }

  /**
   * Read and encode the input image. Runs before the job exists, so slow
   * disks never hold a worker slot.
   */
  private async stageInput(request: GenerateRequest): Promise<{ summary: JobRequestSummary; input: GenerationInput }> {
    const { files, fingerprints } = this.deps;
    const imagePath = await files.resolveUpload(request.file_id);
    const bytes = await files.readFile(imagePath);

    const imageType = detectImageType(bytes);
    if (!imageType) {
      throw new ValidationError(`Uploaded file ${request.file_id} is not a supported image`);
    }

    const modelId: ModelId = request.model;
    const negativePrompt =
      request.negative_prompt !== undefined && normalizeText(request.negative_prompt) !== ''
        ? normalizeText(request.negative_prompt)
        : undefined;

    const summary: JobRequestSummary = {
      modelId,
      prompt: normalizeText(request.prompt),
      negativePrompt,
      duration: request.duration,
      aspectRatio: request.aspect_ratio,
      cfgScale: request.cfg_scale,
      imageSha256: fingerprints.hashImage(bytes),
    };

    const input: GenerationInput = {
      endpoint: MODEL_CATALOG[modelId].endpoint,
      prompt: summary.prompt,
      negativePrompt,
      duration: summary.duration,
      aspectRatio: summary.aspectRatio,
      cfgScale: summary.cfgScale,
      imageDataUri: toDataUri(bytes, imageType.mimeType),
    };

    return { summary, input };
  }
}
