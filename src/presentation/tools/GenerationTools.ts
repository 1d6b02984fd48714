import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { GenerationService } from '../../application/services/GenerationService.js';
import { JobStatusView } from '../../core/entities/Job.js';
import { ASPECT_RATIOS, MODEL_IDS } from '../../core/entities/Model.js';

/**
 * Rate limiting identity shared by every stdio caller
 */
export const MCP_IDENTITY = 'mcp-stdio';

function textResult(text: string) {
  return {
    content: [
      {
        type: 'text' as const,
        text,
      },
    ],
  };
}

function errorResult(prefix: string, error: unknown) {
  return {
    isError: true,
    content: [
      {
        type: 'text' as const,
        text: `${prefix}: ${error instanceof Error ? error.message : String(error)}`,
      },
    ],
  };
}

function formatJob(job: JobStatusView): string {
  const lines = [
    `- Job ID: ${job.job_id}`,
    `- Status: ${job.status}`,
    `- Progress: ${job.progress_percent}%`,
    `- Message: ${job.message}`,
    `- Model: ${job.model}`,
    `- Attempts: ${job.attempts}`,
    `- From cache: ${job.from_cache ? 'yes' : 'no'}`,
  ];
  if (job.result) {
    lines.push(`- Video URL: ${job.result.videoUrl}`);
  }
  if (job.error) {
    lines.push(`- Error: ${job.error}`);
  }
  return lines.join('\n');
}

/**
 * Register the video generation tools
 */
export function registerGenerationTools(server: McpServer, service: GenerationService) {
  // upload-image tool
  server.tool(
    'upload-image',
    'Upload a local image file to use as the first frame of a video',
    {
      image_path: z.string().min(1).describe('Path of the image file on this machine'),
    },
    async ({ image_path }) => {
      try {
        const bytes = await readFile(image_path);
        const stored = await service.uploadImage(MCP_IDENTITY, bytes, path.basename(image_path));

        return textResult(`# Image Uploaded

- File ID: ${stored.fileId}
- Size: ${stored.size} bytes
- Type: ${stored.contentType}

Pass the file ID to \`generate-video\`.`);
      } catch (error) {
        return errorResult('Error uploading image', error);
      }
    }
  );

  // generate-video tool
  server.tool(
    'generate-video',
    'Submit an image-to-video generation. Returns a job ID; identical requests share one job or a cached result.',
    {
      file_id: z.string().describe('File ID returned by upload-image'),
      model: z.enum(MODEL_IDS).describe('Video model to use'),
      prompt: z.string().describe('What should happen in the video'),
      negative_prompt: z.string().optional().describe('What to avoid (optional)'),
      duration: z.number().int().describe('Length in seconds (5 or 10 for most models)'),
      aspect_ratio: z.enum(ASPECT_RATIOS).default('16:9').describe('Output aspect ratio'),
      cfg_scale: z.number().min(0).max(1).optional().describe('Prompt adherence between 0 and 1 (optional)'),
    },
    async (args) => {
      try {
        const result = await service.submit(MCP_IDENTITY, args);
        const origin = result.cached
          ? 'Served from cache, no provider call was made.'
          : result.deduplicated
            ? 'An identical request is already running; this call was attached to it.'
            : 'Queued for generation.';

        return textResult(`# Video Generation Submitted

- Job ID: ${result.jobId}
- Status: ${result.status}
- Fingerprint: ${result.fingerprint}
- Estimated cost: $${result.estimatedCostUsd.toFixed(2)}

${origin}

Use \`get-job-status\` with the job ID to follow progress.`);
      } catch (error) {
        return errorResult('Error submitting generation', error);
      }
    }
  );

  // get-job-status tool
  server.tool(
    'get-job-status',
    'Get the status, progress and result of a generation job',
    {
      job_id: z.string().describe('The job ID to check'),
    },
    async ({ job_id }) => {
      try {
        const job = service.getStatus(MCP_IDENTITY, job_id);
        return textResult(`# Job Status\n\n${formatJob(job)}`);
      } catch (error) {
        return errorResult('Error getting job status', error);
      }
    }
  );

  // list-jobs tool
  server.tool(
    'list-jobs',
    'List generation jobs, newest first',
    {
      status: z
        .enum(['queued', 'running', 'completed', 'failed', 'cancelled'])
        .optional()
        .describe('Filter jobs by status (optional)'),
    },
    async ({ status }) => {
      try {
        const jobs = service.listJobs(MCP_IDENTITY, status);
        const text = `# Generation Jobs

${jobs.length === 0 ? 'No jobs found' : jobs.map(formatJob).join('\n\n')}`;
        return textResult(text);
      } catch (error) {
        return errorResult('Error listing jobs', error);
      }
    }
  );

  // cancel-job tool
  server.tool(
    'cancel-job',
    'Cancel a queued or running job. A running provider call still finishes and is billed.',
    {
      job_id: z.string().describe('The job ID to cancel'),
    },
    async ({ job_id }) => {
      try {
        const { job, outcome } = service.cancel(MCP_IDENTITY, job_id);
        const summary =
          outcome === 'cancelled'
            ? 'Job cancelled before it started.'
            : outcome === 'pending'
              ? 'Cancellation requested; the job stops once the provider call settles.'
              : `Job already finished with status ${job.status}.`;

        return textResult(`# Cancel Job\n\n${summary}\n\n${formatJob(job)}`);
      } catch (error) {
        return errorResult('Error cancelling job', error);
      }
    }
  );

  // download-video tool
  server.tool(
    'download-video',
    'Save the finished video of a completed job, with a metadata file, to the output directory',
    {
      job_id: z.string().describe('The completed job to download'),
    },
    async ({ job_id }) => {
      try {
        const archived = await service.downloadResult(MCP_IDENTITY, job_id);
        return textResult(`# Video Downloaded

- Video: ${archived.videoPath}
- Metadata: ${archived.metadataPath}
- Size: ${archived.size} bytes
- SHA-256: ${archived.sha256}`);
      } catch (error) {
        return errorResult('Error downloading video', error);
      }
    }
  );

  // invalidate-cache tool
  server.tool(
    'invalidate-cache',
    'Drop a cached result so the next identical request is generated again',
    {
      fingerprint: z.string().describe('Request fingerprint shown by generate-video'),
    },
    async ({ fingerprint }) => {
      try {
        const removed = await service.invalidateCache(MCP_IDENTITY, fingerprint);
        return textResult(
          removed ? `Cache entry ${fingerprint} removed.` : `No local cache entry for ${fingerprint}; shared cache cleared.`
        );
      } catch (error) {
        return errorResult('Error invalidating cache', error);
      }
    }
  );

  // list-models tool
  server.tool('list-models', 'List the supported video models and their prices', {}, async () => {
    const rows = service
      .getModels()
      .map(
        (model) =>
          `| ${model.id} | ${model.name} | ${model.durations.join(', ')}s | ` +
          Object.entries(model.prices)
            .map(([duration, price]) => `${duration}s $${price.toFixed(2)}`)
            .join(', ') +
          ' |'
      );

    return textResult(`# Video Models

| ID | Name | Durations | Price |
|----|------|-----------|-------|
${rows.join('\n')}`);
  });

  // health-check tool
  server.tool('health-check', 'Check provider, cache, queue and rate limiter health', {}, async () => {
    try {
      const health = await service.getHealth();
      const statusIcon = health.status === 'healthy' ? '✅' : '⚠️';

      return textResult(`# Health Check Report

## Overall Status: ${statusIcon} ${health.status.toUpperCase()}

## Provider
- Reachable: ${health.provider.healthy ? 'yes' : 'no'}
- Circuit Breaker: ${health.provider.circuitBreaker}

## Cache
- Hits: ${health.cache.hits}
- Misses: ${health.cache.misses}
- Local entries: ${health.cache.localSize}
- Shared cache: ${health.cache.external}

## Queue
- Running: ${health.queue.active}/${health.queue.maxConcurrency}
- Waiting: ${health.queue.queued}/${health.queue.maxQueueSize}
- Provider calls: ${health.queue.providerCalls}

## Jobs
- Total: ${health.jobs.total}
- Completed: ${health.jobs.completed}
- Failed: ${health.jobs.failed}
- Cancelled: ${health.jobs.cancelled}`);
    } catch (error) {
      return errorResult('Error running health check', error);
    }
  });
}
