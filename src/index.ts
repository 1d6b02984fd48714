#!/usr/bin/env node

/**
 * Video generation orchestrator - Entry Point
 *
 * Wires configuration, cache, rate limiter, job table, worker pool and the
 * HTTP / MCP front ends together.
 */

import { getConfig, printConfigInfo } from './config.js';
import { FingerprintKeyBuilder } from './application/services/FingerprintKeyBuilder.js';
import { GenerationService } from './application/services/GenerationService.js';
import { IExternalCache } from './core/interfaces/IExternalCache.js';
import { CacheStore } from './infrastructure/cache/CacheStore.js';
import { RedisExternalCache } from './infrastructure/cache/RedisExternalCache.js';
import { DatabaseConnection } from './infrastructure/database/DatabaseConnection.js';
import { JobRepository } from './infrastructure/database/repositories/JobRepository.js';
import { AsyncFileManager } from './infrastructure/files/AsyncFileManager.js';
import { ResultArchiver } from './infrastructure/files/ResultArchiver.js';
import { FalApiClient } from './infrastructure/http/FalApiClient.js';
import { ProgressPublisher } from './infrastructure/progress/ProgressPublisher.js';
import { BatchProcessor } from './infrastructure/queue/BatchProcessor.js';
import { JobRegistry } from './infrastructure/queue/JobRegistry.js';
import { RateLimiter } from './infrastructure/ratelimit/RateLimiter.js';
import { WebServer } from './infrastructure/web/WebServer.js';
import { McpServer } from './presentation/McpServer.js';
import { createLogger } from './utils/logger.js';
import { CircuitBreaker } from './utils/retry.js';

async function main() {
  const config = getConfig();
  printConfigInfo(config);

  const debug = config.server.debug;
  const logger = createLogger('Main', debug);

  const onFatal = (error: Error) => {
    logger.error('Invariant violated, exiting:', error);
    process.exit(1);
  };

  let externalCache: IExternalCache | null = null;
  if (config.cache.redisUrl) {
    externalCache = new RedisExternalCache(config.cache.redisUrl, createLogger('Redis', debug));
  }
  const cache = new CacheStore(externalCache, {
    defaultTtlSeconds: config.cache.ttlSeconds,
    maxLocalEntries: config.cache.maxLocalEntries,
    retryBackoffMs: config.cache.retryBackoffMs,
    logger: createLogger('Cache', debug),
  });

  const { windowSeconds } = config.rateLimit;
  const rateLimiter = new RateLimiter({
    policies: {
      upload: { limit: config.rateLimit.upload, windowSeconds },
      generate: { limit: config.rateLimit.generate, windowSeconds },
      api: { limit: config.rateLimit.api, windowSeconds },
    },
    maxBlockSeconds: config.rateLimit.maxBlockSeconds,
    violationGraceSeconds: config.rateLimit.violationGraceSeconds,
    logger: createLogger('RateLimiter', debug),
  });

  let database: DatabaseConnection | null = null;
  if (config.jobs.dbPath) {
    database = new DatabaseConnection(config.jobs.dbPath);
    logger.debug(`Job history mirrored to ${database.getDatabasePath()}`);
  }

  const registry = new JobRegistry({
    repository: database ? new JobRepository(database.getDatabase()) : undefined,
    logger: createLogger('Jobs', debug),
  });
  const restored = registry.restore();
  if (restored > 0) {
    logger.info(`Restored ${restored} job(s) from ${config.jobs.dbPath}`);
  }
  const publisher = new ProgressPublisher();
  const maxUploadBytes = Math.round(config.uploads.maxUploadMb * 1024 * 1024);
  const files = new AsyncFileManager({
    uploadDir: config.uploads.dir,
    maxUploadBytes,
    logger: createLogger('Files', debug),
  });

  const provider = new FalApiClient({
    apiKey: config.provider.apiKey,
    queueUrl: config.provider.queueUrl,
    pollIntervalMs: config.provider.pollIntervalMs,
    circuitBreaker: new CircuitBreaker(5, 60000),
    logger: createLogger('Provider', debug),
  });

  const processor = new BatchProcessor(registry, provider, cache, publisher, {
    maxConcurrency: config.queue.maxConcurrency,
    maxQueueSize: config.queue.maxQueueSize,
    cacheTtlSeconds: config.cache.ttlSeconds,
    retry: {
      maxAttempts: config.queue.maxRetryAttempts,
      initialDelayMs: config.queue.retryBackoffBaseMs,
      maxDelayMs: config.queue.retryMaxDelayMs,
      multiplier: 2,
      timeoutMs: config.provider.callTimeoutMs,
      jitter: true,
    },
    logger: createLogger('Worker', debug),
    onFatal,
  });

  const service = new GenerationService(
    {
      registry,
      processor,
      cache,
      rateLimiter,
      publisher,
      files,
      archiver: new ResultArchiver(files, {
        outputDir: config.uploads.outputDir,
        logger: createLogger('Archive', debug),
      }),
      fingerprints: new FingerprintKeyBuilder(),
      provider,
    },
    {
      jobRetentionMs: config.jobs.retentionMinutes * 60 * 1000,
      logger: createLogger('Orchestrator', debug),
    }
  );
  service.start();

  const webServer = new WebServer(service, {
    port: config.server.port,
    maxUploadBytes,
    logger: createLogger('HTTP', debug),
    onFatal,
  });
  await webServer.start();

  let mcpServer: McpServer | null = null;
  if (config.mcp.enabled) {
    mcpServer = new McpServer(
      { name: config.server.name, version: config.server.version },
      service,
      createLogger('MCP', debug)
    );
    await mcpServer.start();
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down gracefully...`);

    await webServer.stop();
    if (mcpServer) {
      await mcpServer.shutdown();
    }

    const { active, queued } = processor.getStatistics();
    if (active + queued > 0) {
      logger.info(`Waiting for ${active} running and ${queued} queued job(s)`);
    }
    await service.stop();

    if (externalCache) {
      await externalCache.close();
    }
    database?.close();

    logger.info('Goodbye!');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('Shutdown failed:', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('💥 Fatal error in main():', error);
  process.exit(1);
});
