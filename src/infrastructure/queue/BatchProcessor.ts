import {
  GenerationInput,
  GenerationResult,
  Job,
  TransitionPayload,
  toProgressEvent,
} from '../../core/entities/Job.js';
import {
  BackpressureError,
  CancelledError,
  InvalidTransitionError,
  InvariantViolationError,
  toUserMessage,
} from '../../core/errors.js';
import { IGenerationProvider } from '../../core/interfaces/IGenerationProvider.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { DEFAULT_RETRY_CONFIG, RetryConfig, RetryLog, sleep, withRetry } from '../../utils/retry.js';
import { CacheStore } from '../cache/CacheStore.js';
import { ProgressPublisher } from '../progress/ProgressPublisher.js';
import { JobRegistry } from './JobRegistry.js';

export interface BatchProcessorOptions {
  maxConcurrency: number;
  maxQueueSize: number;
  cacheTtlSeconds: number;
  retry: RetryConfig;
  logger: Logger;
  sleep: (ms: number) => Promise<void>;
  random: () => number;
  onFatal: (error: Error) => void;
}

interface Outcome {
  status: 'completed' | 'failed' | 'cancelled';
  payload: TransitionPayload;
}

interface QueuedWork {
  jobId: string;
  input: GenerationInput;
}

/**
 * Bounded pool of workers between the job registry and the provider.
 *
 * Work is taken in FIFO order. Each worker owns one provider call at a time,
 * retries transient failures with backoff and writes successful results to
 * the cache before the job is reported complete.
 */
export class BatchProcessor {
  private readonly options: BatchProcessorOptions;
  private queue: QueuedWork[] = [];
  private active = 0;
  private peakConcurrency = 0;
  private idleWaiters: Array<() => void> = [];
  private counters = { completed: 0, failed: 0, cancelled: 0, skipped: 0, providerCalls: 0 };

  constructor(
    private registry: JobRegistry,
    private provider: IGenerationProvider,
    private cache: CacheStore,
    private publisher: ProgressPublisher,
    options: Partial<BatchProcessorOptions> = {}
  ) {
    this.options = {
      maxConcurrency: 10,
      maxQueueSize: 100,
      cacheTtlSeconds: 3600,
      retry: DEFAULT_RETRY_CONFIG,
      logger: silentLogger,
      sleep,
      random: Math.random,
      onFatal: (error) => {
        setImmediate(() => {
          throw error;
        });
      },
      ...options,
    };
  }

  hasCapacity(): boolean {
    return this.queue.length < this.options.maxQueueSize;
  }

  /**
   * Queue a job that is already registered as queued. Throws
   * BackpressureError when the queue is at its high-water mark.
   */
  enqueue(jobId: string, input: GenerationInput): void {
    if (!this.hasCapacity()) {
      throw new BackpressureError(this.queue.length, this.options.maxQueueSize);
    }

    this.queue.push({ jobId, input });
    this.emit(this.registry.require(jobId));
    this.options.logger.debug(`Queued job ${jobId} (${this.queue.length} waiting, ${this.active} running)`);
    this.processQueue();
  }

  /**
   * Drop a job that was cancelled while still waiting, so it stops counting
   * against the queue limit. Returns false when it was not queued here.
   */
  discard(jobId: string): boolean {
    const index = this.queue.findIndex((work) => work.jobId === jobId);
    if (index === -1) return false;

    this.queue.splice(index, 1);
    this.counters.skipped++;
    this.options.logger.debug(`Discarded job ${jobId} (${this.queue.length} waiting)`);
    this.notifyIfIdle();
    return true;
  }

  /**
   * Resolves once nothing is queued or running.
   */
  drain(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  getStatistics() {
    return {
      active: this.active,
      queued: this.queue.length,
      peakConcurrency: this.peakConcurrency,
      maxConcurrency: this.options.maxConcurrency,
      maxQueueSize: this.options.maxQueueSize,
      ...this.counters,
    };
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.active === 0;
  }

  private processQueue(): void {
    while (this.queue.length > 0 && this.active < this.options.maxConcurrency) {
      const work = this.queue.shift();
      if (!work) break;

      const job = this.registry.get(work.jobId);
      if (!job || job.status !== 'queued') {
        this.counters.skipped++;
        this.options.logger.debug(`Skipping job ${work.jobId} (${job ? job.status : 'evicted'})`);
        continue;
      }

      this.active++;
      this.peakConcurrency = Math.max(this.peakConcurrency, this.active);
      this.emit(this.registry.transition(work.jobId, 'running'));

      void this.runJob(work)
        .catch((error: unknown) => {
          this.options.logger.error(`Worker for job ${work.jobId} crashed:`, error);
          this.options.onFatal(error instanceof Error ? error : new Error(String(error)));
        })
        .finally(() => {
          this.active--;
          this.processQueue();
          this.notifyIfIdle();
        });
    }

    this.notifyIfIdle();
  }

  private async runJob(work: QueuedWork): Promise<void> {
    const { jobId } = work;
    const fingerprint = this.registry.require(jobId).fingerprint;
    let outcome: Outcome;

    try {
      const result = await withRetry<GenerationResult>(
        (attempt, signal) => this.callProvider(work, attempt, signal),
        this.options.retry,
        {
          isCancelled: () => this.registry.get(jobId)?.cancelRequested ?? true,
          onLog: (log) => this.onAttemptLog(jobId, log),
          sleep: this.options.sleep,
          random: this.options.random,
        }
      );

      // The provider bills for a finished call, so keep the result even
      // when the job was cancelled meanwhile.
      await this.cache.put(fingerprint, result, this.options.cacheTtlSeconds);

      outcome = this.registry.require(jobId).cancelRequested
        ? { status: 'cancelled', payload: { message: 'Cancelled; the finished video was cached' } }
        : { status: 'completed', payload: { result } };
    } catch (error) {
      if (error instanceof InvariantViolationError || error instanceof InvalidTransitionError) {
        throw error;
      }

      if (error instanceof CancelledError || this.registry.get(jobId)?.cancelRequested) {
        outcome = { status: 'cancelled', payload: { message: 'Job cancelled' } };
      } else {
        this.options.logger.error(`Job ${jobId} failed:`, error instanceof Error ? error.message : error);
        outcome = { status: 'failed', payload: { error: toUserMessage(error) } };
      }
    }

    this.finish(jobId, outcome);
  }

  private async callProvider(work: QueuedWork, attempt: number, signal: AbortSignal): Promise<GenerationResult> {
    const { jobId } = work;
    this.registry.recordAttempt(jobId);
    this.counters.providerCalls++;

    if (attempt > 1) {
      const current = this.registry.require(jobId);
      this.reportProgress(
        jobId,
        current.progress,
        `Retrying generation (attempt ${attempt}/${this.options.retry.maxAttempts})`
      );
    }

    return this.provider.generate(work.input, {
      signal,
      onProgress: (percentage, message) => {
        // Late reports from an abandoned attempt are ignored
        if (!signal.aborted) {
          this.reportProgress(jobId, percentage, message);
        }
      },
    });
  }

  private reportProgress(jobId: string, percentage: number, message: string): void {
    if (this.registry.updateProgress(jobId, percentage, message)) {
      this.emit(this.registry.require(jobId));
    }
  }

  private onAttemptLog(jobId: string, log: RetryLog): void {
    if (log.success) {
      this.options.logger.debug(`Job ${jobId}: attempt ${log.attempt} succeeded`);
      return;
    }
    if (log.nextRetryInMs !== undefined) {
      this.options.logger.warn(
        `Job ${jobId}: attempt ${log.attempt} failed (${log.error}), retrying in ${log.nextRetryInMs}ms`
      );
    }
  }

  private finish(jobId: string, { status, payload }: Outcome): void {
    const job = this.registry.transition(jobId, status, payload);
    this.counters[status]++;
    this.emit(job);
    this.publisher.complete(jobId);
    this.options.logger.info(`Job ${jobId} ${status} after ${job.attemptCount} attempt(s)`);
  }

  private emit(job: Job): void {
    this.publisher.publish(job.id, toProgressEvent(job));
  }

  private notifyIfIdle(): void {
    if (!this.isIdle() || this.idleWaiters.length === 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
