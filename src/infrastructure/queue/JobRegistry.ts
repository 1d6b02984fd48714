import { randomUUID } from 'crypto';
import {
  GenerationResult,
  Job,
  JobRequestSummary,
  JobStatus,
  TransitionPayload,
  isTerminal,
} from '../../core/entities/Job.js';
import { InvalidTransitionError, InvariantViolationError, JobNotFoundError } from '../../core/errors.js';
import { IJobRepository } from '../../core/interfaces/IJobRepository.js';
import { Logger, silentLogger } from '../../utils/logger.js';

const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ['running', 'cancelled'],
  running: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

const DEFAULT_MESSAGES: Record<JobStatus, string> = {
  queued: 'Queued for generation',
  running: 'Generation started',
  completed: 'Video generated successfully',
  failed: 'Generation failed',
  cancelled: 'Job cancelled',
};

export type CancelOutcome = 'cancelled' | 'pending' | 'already_terminal';

export interface JobRegistryOptions {
  repository?: IJobRepository;
  now?: () => number;
  idFactory?: () => string;
  logger?: Logger;
}

/**
 * Authoritative table of jobs.
 *
 * Stored jobs are frozen snapshots; every mutation builds a new snapshot and
 * swaps it in within one synchronous section, so readers see either the old
 * or the new job, never a mix. Queued and running jobs are indexed by
 * fingerprint, which is what in-flight deduplication relies on.
 */
export class JobRegistry {
  private jobs: Map<string, Job> = new Map();
  private inFlight: Map<string, string> = new Map();
  private repository?: IJobRepository;
  private now: () => number;
  private idFactory: () => string;
  private logger: Logger;

  constructor(options: JobRegistryOptions = {}) {
    this.repository = options.repository;
    this.now = options.now ?? Date.now;
    this.idFactory = options.idFactory ?? randomUUID;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Create a queued job. At most one job per fingerprint may be in flight;
   * callers check `findInFlight` first in the same synchronous section.
   */
  create(fingerprint: string, request: JobRequestSummary, estimatedCostUsd: number): Job {
    const existing = this.inFlight.get(fingerprint);
    if (existing) {
      throw new InvariantViolationError(
        `Fingerprint ${fingerprint} already has job ${existing} in flight`
      );
    }

    const job = this.store({
      id: this.newId(),
      fingerprint,
      request: Object.freeze({ ...request }),
      status: 'queued',
      progress: 0,
      message: DEFAULT_MESSAGES.queued,
      createdAt: new Date(this.now()),
      attemptCount: 0,
      cancelRequested: false,
      attachedRequests: 1,
      fromCache: false,
      estimatedCostUsd,
    });
    this.inFlight.set(fingerprint, job.id);
    return job;
  }

  /**
   * Record for a request answered from the cache. The job is born completed
   * and never enters the in-flight index.
   */
  createCompleted(
    fingerprint: string,
    request: JobRequestSummary,
    result: GenerationResult,
    estimatedCostUsd: number
  ): Job {
    const at = new Date(this.now());
    return this.store({
      id: this.newId(),
      fingerprint,
      request: Object.freeze({ ...request }),
      status: 'completed',
      progress: 100,
      message: 'Served from cache',
      result: Object.freeze({ ...result }),
      createdAt: at,
      startedAt: at,
      finishedAt: at,
      attemptCount: 0,
      cancelRequested: false,
      attachedRequests: 1,
      fromCache: true,
      estimatedCostUsd,
    });
  }

  /**
   * Load the history left by a previous process. Jobs it left queued or
   * running lost their worker and are marked failed.
   */
  restore(): number {
    if (!this.repository) return 0;

    const jobs = this.repository.getAllJobs().reverse();
    let restored = 0;
    for (const job of jobs) {
      if (this.jobs.has(job.id)) continue;
      restored++;

      if (isTerminal(job.status)) {
        this.jobs.set(job.id, Object.freeze(job));
        continue;
      }
      this.store({
        ...job,
        status: 'failed',
        message: DEFAULT_MESSAGES.failed,
        error: 'Interrupted by a server restart',
        finishedAt: new Date(this.now()),
      });
    }
    return restored;
  }

  get(jobId: string): Job | null {
    return this.jobs.get(jobId) ?? null;
  }

  require(jobId: string): Job {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  findInFlight(fingerprint: string): Job | null {
    const jobId = this.inFlight.get(fingerprint);
    return jobId ? this.require(jobId) : null;
  }

  /**
   * Add a caller to an in-flight job. A pending cancellation is withdrawn:
   * the new caller wants the result and the provider call is already paid.
   */
  attach(jobId: string): Job {
    const job = this.require(jobId);
    if (isTerminal(job.status)) {
      throw new InvariantViolationError(`Cannot attach to ${job.status} job ${jobId}`);
    }

    const next: Job = { ...job, attachedRequests: job.attachedRequests + 1 };
    if (job.cancelRequested) {
      next.cancelRequested = false;
      next.message = 'Cancellation withdrawn, another request is waiting for the result';
      this.logger.debug(`Job ${jobId}: cancellation withdrawn by a new caller`);
    }
    return this.store(next);
  }

  transition(jobId: string, to: JobStatus, payload: TransitionPayload = {}): Job {
    const job = this.require(jobId);
    if (!ALLOWED_TRANSITIONS[job.status].includes(to)) {
      throw new InvalidTransitionError(jobId, job.status, to);
    }

    const at = new Date(this.now());
    const next: Job = { ...job, status: to, message: payload.message ?? DEFAULT_MESSAGES[to] };

    if (to === 'running') {
      next.startedAt = at;
    }
    if (to === 'completed') {
      if (!payload.result) {
        throw new InvariantViolationError(`Job ${jobId} cannot complete without a result`);
      }
      next.result = Object.freeze({ ...payload.result });
      next.progress = 100;
    }
    if (to === 'failed') {
      next.error = payload.error ?? DEFAULT_MESSAGES.failed;
    }
    if (isTerminal(to)) {
      next.finishedAt = at;
      if (this.inFlight.get(job.fingerprint) === jobId) {
        this.inFlight.delete(job.fingerprint);
      }
    }

    this.logger.debug(`Job ${jobId}: ${job.status} -> ${to}`);
    return this.store(next);
  }

  /**
   * Apply a progress report to a running job. Returns false when the update
   * was dropped: job not running, lower percentage, or nothing new.
   */
  updateProgress(jobId: string, percentage: number, message: string): boolean {
    const job = this.require(jobId);
    if (job.status !== 'running' || !Number.isFinite(percentage)) {
      return false;
    }

    const clamped = Math.round(Math.min(100, Math.max(0, percentage)));
    if (clamped < job.progress || (clamped === job.progress && message === job.message)) {
      return false;
    }

    this.store({ ...job, progress: clamped, message });
    return true;
  }

  recordAttempt(jobId: string): Job {
    const job = this.require(jobId);
    if (job.status !== 'running') {
      throw new InvariantViolationError(`Attempt recorded for ${job.status} job ${jobId}`);
    }
    return this.store({ ...job, attemptCount: job.attemptCount + 1 });
  }

  /**
   * Queued jobs are cancelled at once. Running jobs only get the flag; the
   * worker marks them cancelled once the in-flight call settles.
   */
  requestCancel(jobId: string): { job: Job; outcome: CancelOutcome } {
    const job = this.require(jobId);

    if (isTerminal(job.status)) {
      return { job, outcome: 'already_terminal' };
    }
    if (job.status === 'queued') {
      this.store({ ...job, cancelRequested: true });
      return {
        job: this.transition(jobId, 'cancelled', { message: 'Cancelled before start' }),
        outcome: 'cancelled',
      };
    }

    return {
      job: this.store({
        ...job,
        cancelRequested: true,
        message: 'Cancellation requested, waiting for the provider call to settle',
      }),
      outcome: 'pending',
    };
  }

  list(status?: JobStatus): Job[] {
    const jobs = Array.from(this.jobs.values()).reverse();
    return status ? jobs.filter((job) => job.status === status) : jobs;
  }

  /**
   * Evict terminal jobs that finished at least `retentionMs` ago and return
   * their ids.
   */
  gc(retentionMs: number): string[] {
    const cutoff = this.now() - retentionMs;
    const evicted: string[] = [];

    for (const [jobId, job] of this.jobs.entries()) {
      if (isTerminal(job.status) && job.finishedAt && job.finishedAt.getTime() <= cutoff) {
        this.jobs.delete(jobId);
        evicted.push(jobId);
      }
    }

    if (evicted.length > 0 && this.repository) {
      try {
        this.repository.deleteJobs(evicted);
      } catch (error) {
        this.logger.error(`Failed to prune ${evicted.length} jobs from the database:`, error);
      }
    }

    if (evicted.length > 0) {
      this.logger.debug(`Evicted ${evicted.length} finished jobs`);
    }
    return evicted;
  }

  getStatistics() {
    const counts: Record<JobStatus, number> = {
      queued: 0,
      running: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
    };
    let fromCache = 0;
    for (const job of this.jobs.values()) {
      counts[job.status]++;
      if (job.fromCache) fromCache++;
    }

    return {
      total: this.jobs.size,
      ...counts,
      inFlight: this.inFlight.size,
      fromCache,
    };
  }

  private newId(): string {
    let id = this.idFactory();
    while (this.jobs.has(id)) {
      id = this.idFactory();
    }
    return id;
  }

  private store(job: Job): Job {
    const snapshot = Object.freeze(job);
    this.jobs.set(snapshot.id, snapshot);

    if (this.repository) {
      try {
        this.repository.saveJob(snapshot);
      } catch (error) {
        this.logger.error(`Failed to persist job ${snapshot.id} to database:`, error);
      }
    }

    return snapshot;
  }
}
