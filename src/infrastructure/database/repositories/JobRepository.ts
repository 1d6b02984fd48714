import Database from 'better-sqlite3';
import { z } from 'zod';
import { IJobRepository } from '../../../core/interfaces/IJobRepository.js';
import { Job } from '../../../core/entities/Job.js';
import { ASPECT_RATIOS, MODEL_IDS } from '../../../core/entities/Model.js';

const JobRowSchema = z.object({
  id: z.string(),
  fingerprint: z.string(),
  status: z.enum(['queued', 'running', 'completed', 'failed', 'cancelled']),
  progress: z.number(),
  message: z.string(),
  request: z.string(),
  result: z.string().nullable(),
  error: z.string().nullable(),
  attempt_count: z.number(),
  cancel_requested: z.number(),
  attached_requests: z.number(),
  from_cache: z.number(),
  estimated_cost_usd: z.number(),
  created_at: z.string(),
  started_at: z.string().nullable(),
  finished_at: z.string().nullable(),
});

const RequestSchema = z.object({
  modelId: z.enum(MODEL_IDS),
  prompt: z.string(),
  negativePrompt: z.string().optional(),
  duration: z.number(),
  aspectRatio: z.enum(ASPECT_RATIOS),
  cfgScale: z.number().optional(),
  imageSha256: z.string(),
});

const ResultSchema = z.object({
  videoUrl: z.string(),
  providerRequestId: z.string().optional(),
  seed: z.number().optional(),
  contentType: z.string().optional(),
  fileSize: z.number().optional(),
});

/**
 * SQLite implementation of job repository
 */
export class JobRepository implements IJobRepository {
  constructor(private db: Database.Database) {}

  saveJob(job: Job): void {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO jobs (
        id, fingerprint, status, progress, message, request, result, error,
        attempt_count, cancel_requested, attached_requests, from_cache, estimated_cost_usd,
        created_at, started_at, finished_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      job.id,
      job.fingerprint,
      job.status,
      job.progress,
      job.message,
      JSON.stringify(job.request),
      job.result ? JSON.stringify(job.result) : null,
      job.error ?? null,
      job.attemptCount,
      job.cancelRequested ? 1 : 0,
      job.attachedRequests,
      job.fromCache ? 1 : 0,
      job.estimatedCostUsd,
      job.createdAt.toISOString(),
      job.startedAt ? job.startedAt.toISOString() : null,
      job.finishedAt ? job.finishedAt.toISOString() : null
    );
  }

  loadJob(jobId: string): Job | null {
    const row: unknown = this.db.prepare('SELECT * FROM jobs WHERE id = ?').get(jobId);
    return row === undefined ? null : this.toJob(row);
  }

  getAllJobs(): Job[] {
    const rows: unknown[] = this.db.prepare('SELECT * FROM jobs ORDER BY created_at DESC').all();
    return rows.map((row) => this.toJob(row));
  }

  deleteJobs(jobIds: string[]): number {
    if (jobIds.length === 0) return 0;

    const stmt = this.db.prepare('DELETE FROM jobs WHERE id = ?');
    const deleteAll = this.db.transaction((ids: string[]) => {
      let changes = 0;
      for (const id of ids) {
        changes += stmt.run(id).changes;
      }
      return changes;
    });
    return deleteAll(jobIds);
  }

  private toJob(raw: unknown): Job {
    const row = JobRowSchema.parse(raw);
    return {
      id: row.id,
      fingerprint: row.fingerprint,
      status: row.status,
      progress: row.progress,
      message: row.message,
      request: RequestSchema.parse(JSON.parse(row.request)),
      result: row.result ? ResultSchema.parse(JSON.parse(row.result)) : undefined,
      error: row.error ?? undefined,
      attemptCount: row.attempt_count,
      cancelRequested: row.cancel_requested === 1,
      attachedRequests: row.attached_requests,
      fromCache: row.from_cache === 1,
      estimatedCostUsd: row.estimated_cost_usd,
      createdAt: new Date(row.created_at),
      startedAt: row.started_at ? new Date(row.started_at) : undefined,
      finishedAt: row.finished_at ? new Date(row.finished_at) : undefined,
    };
  }
}
