import { Job } from '../entities/Job.js';

/**
 * Interface for job history persistence. Records live exactly as long as the
 * in-memory job they mirror.
 */
export interface IJobRepository {
  saveJob(job: Job): void;

  loadJob(jobId: string): Job | null;

  getAllJobs(): Job[];

  deleteJobs(jobIds: string[]): number;
}
