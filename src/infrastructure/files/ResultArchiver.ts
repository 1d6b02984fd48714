import fetch from 'node-fetch';
import path from 'path';
import { Job } from '../../core/entities/Job.js';
import { MODEL_CATALOG } from '../../core/entities/Model.js';
import { ProviderError, ValidationError } from '../../core/errors.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import type { FetchFn } from '../http/FalApiClient.js';
import { AsyncFileManager } from './AsyncFileManager.js';

export interface ResultArchiverOptions {
  outputDir: string;
  fetchFn?: FetchFn;
  now?: () => number;
  logger?: Logger;
}

export interface ArchivedResult {
  jobId: string;
  videoPath: string;
  metadataPath: string;
  size: number;
  sha256: string;
}

/**
 * Downloads finished videos into `<outputDir>/videos` and writes a JSON
 * description of each generation next to them in `<outputDir>/metadata`.
 */
export class ResultArchiver {
  private readonly outputDir: string;
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private files: AsyncFileManager,
    options: ResultArchiverOptions
  ) {
    this.outputDir = path.resolve(options.outputDir);
    this.fetchFn = options.fetchFn ?? fetch;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  async archive(job: Job): Promise<ArchivedResult> {
    const { result } = job;
    if (job.status !== 'completed' || !result) {
      throw new ValidationError(`Job ${job.id} has no finished video to download (status ${job.status})`);
    }

    const videoPath = path.join(this.outputDir, 'videos', `${job.id}${videoExtension(result.videoUrl)}`);
    const metadataPath = path.join(this.outputDir, 'metadata', `${job.id}.json`);

    let bytes: Buffer;
    try {
      const response = await this.fetchFn(result.videoUrl);
      if (!response.ok) {
        throw new ProviderError(
          response.status >= 500 ? 'server' : 'client',
          `Could not download the video (HTTP ${response.status})`,
          response.status
        );
      }
      bytes = await response.buffer();
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      throw new ProviderError('network', 'Could not download the video', undefined, { cause: error });
    }

    await this.files.write(videoPath, bytes);
    const sha256 = await this.files.hashFile(videoPath);

    const model = MODEL_CATALOG[job.request.modelId];
    const metadata = {
      generation: {
        job_id: job.id,
        fingerprint: job.fingerprint,
        model: job.request.modelId,
        model_name: model.name,
        prompt: job.request.prompt,
        negative_prompt: job.request.negativePrompt ?? null,
        duration: job.request.duration,
        aspect_ratio: job.request.aspectRatio,
        cfg_scale: job.request.cfgScale ?? null,
        source_image_sha256: job.request.imageSha256,
        created_at: job.createdAt.toISOString(),
        finished_at: job.finishedAt?.toISOString() ?? null,
        from_cache: job.fromCache,
        attempts: job.attemptCount,
      },
      result: {
        video_url: result.videoUrl,
        provider_request_id: result.providerRequestId ?? null,
        seed: result.seed ?? null,
        content_type: result.contentType ?? null,
      },
      file: {
        name: path.basename(videoPath),
        size: bytes.length,
        sha256,
      },
      cost: {
        estimated_usd: job.estimatedCostUsd,
        cost_per_second: model.costPerSecond,
      },
      archived_at: new Date(this.now()).toISOString(),
    };
    await this.files.write(metadataPath, Buffer.from(`${JSON.stringify(metadata, null, 2)}\n`, 'utf8'));

    this.logger.info(`Archived video of job ${job.id} (${bytes.length} bytes) to ${videoPath}`);
    return { jobId: job.id, videoPath, metadataPath, size: bytes.length, sha256 };
  }

  /**
   * Delete archived videos and metadata last modified before `cutoffMs`.
   */
  async sweep(cutoffMs: number): Promise<number> {
    const videos = await this.files.removeOlderThan(path.join(this.outputDir, 'videos'), cutoffMs);
    const metadata = await this.files.removeOlderThan(path.join(this.outputDir, 'metadata'), cutoffMs);
    return videos.length + metadata.length;
  }
}

function videoExtension(videoUrl: string): string {
  let pathname: string;
  try {
    pathname = new URL(videoUrl).pathname;
  } catch {
    return '.mp4';
  }
  const extension = path.extname(pathname).toLowerCase();
  return /^\.[a-z0-9]{1,5}$/.test(extension) ? extension : '.mp4';
}
