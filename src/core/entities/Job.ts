import { AspectRatio, ModelId } from './Model.js';

/**
 * Job domain entity
 */
export type JobStatus = 'queued' | 'running' | 'completed' | 'failed' | 'cancelled';

export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled'];

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Provider-ready input, staged before the job takes a worker slot.
 */
export interface GenerationInput {
  endpoint: string;
  prompt: string;
  negativePrompt?: string;
  duration: number;
  aspectRatio: AspectRatio;
  cfgScale?: number;
  imageDataUri: string;
}

export interface GenerationResult {
  videoUrl: string;
  providerRequestId?: string;
  seed?: number;
  contentType?: string;
  fileSize?: number;
}

/**
 * Summary of the request kept on the job record. The image itself is only
 * referenced by its content hash.
 */
export interface JobRequestSummary {
  modelId: ModelId;
  prompt: string;
  negativePrompt?: string;
  duration: number;
  aspectRatio: AspectRatio;
  cfgScale?: number;
  imageSha256: string;
}

export interface Job {
  id: string;
  fingerprint: string;
  request: JobRequestSummary;
  status: JobStatus;
  progress: number; // 0-100
  message: string;
  result?: GenerationResult;
  error?: string;
  createdAt: Date;
  startedAt?: Date;
  finishedAt?: Date;
  attemptCount: number;
  cancelRequested: boolean;
  attachedRequests: number;
  fromCache: boolean;
  estimatedCostUsd: number;
}

export interface ProgressEvent {
  jobId: string;
  status: JobStatus;
  progress: number;
  message: string;
  timestamp: string;
}

export interface TransitionPayload {
  message?: string;
  result?: GenerationResult;
  error?: string;
}

/**
 * Shape returned to clients polling a job.
 */
export interface JobStatusView {
  job_id: string;
  status: JobStatus;
  progress_percent: number;
  message: string;
  result?: GenerationResult;
  error?: string;
  fingerprint: string;
  model: ModelId;
  attempts: number;
  from_cache: boolean;
  created_at: string;
  started_at?: string;
  finished_at?: string;
}

export function toStatusView(job: Job): JobStatusView {
  return {
    job_id: job.id,
    status: job.status,
    progress_percent: job.progress,
    message: job.message,
    result: job.result,
    error: job.error,
    fingerprint: job.fingerprint,
    model: job.request.modelId,
    attempts: job.attemptCount,
    from_cache: job.fromCache,
    created_at: job.createdAt.toISOString(),
    started_at: job.startedAt?.toISOString(),
    finished_at: job.finishedAt?.toISOString(),
  };
}

export function toProgressEvent(job: Job, timestamp: Date = new Date()): ProgressEvent {
  return {
    jobId: job.id,
    status: job.status,
    progress: job.progress,
    message: job.message,
    timestamp: timestamp.toISOString(),
  };
}
