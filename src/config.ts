import * as dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
    port: number;
  };
  provider: {
    apiKey: string;
    queueUrl: string;
    pollIntervalMs: number;
    callTimeoutMs: number;
  };
  queue: {
    maxConcurrency: number;
    maxQueueSize: number;
    maxRetryAttempts: number;
    retryBackoffBaseMs: number;
    retryMaxDelayMs: number;
  };
  rateLimit: {
    windowSeconds: number;
    upload: number;
    generate: number;
    api: number;
    maxBlockSeconds: number;
    violationGraceSeconds: number;
  };
  cache: {
    ttlSeconds: number;
    redisUrl?: string;
    maxLocalEntries: number;
    retryBackoffMs: number;
  };
  jobs: {
    retentionMinutes: number;
    dbPath?: string;
  };
  uploads: {
    dir: string;
    maxUploadMb: number;
    outputDir: string;
  };
  mcp: {
    enabled: boolean;
  };
}

const positiveInt = (label: string) => z.number().int(`${label} must be an integer`).min(1, `${label} must be at least 1`);

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
    port: z.number().int().min(0).max(65535),
  }),
  provider: z.object({
    apiKey: z.string(),
    queueUrl: z.string().url('Invalid provider queue URL'),
    pollIntervalMs: z.number().int().min(100),
    callTimeoutMs: z.number().int().min(1000),
  }),
  queue: z.object({
    maxConcurrency: positiveInt('max_concurrency').max(100),
    maxQueueSize: positiveInt('max_queue_size'),
    maxRetryAttempts: positiveInt('max_retry_attempts').max(10),
    retryBackoffBaseMs: z.number().int().min(0).max(60000),
    retryMaxDelayMs: z.number().int().min(0),
  }),
  rateLimit: z.object({
    windowSeconds: positiveInt('rate_limit_window'),
    upload: positiveInt('rate limit for uploads'),
    generate: positiveInt('rate limit for generation'),
    api: positiveInt('rate limit for the API'),
    maxBlockSeconds: positiveInt('max block'),
    violationGraceSeconds: positiveInt('violation grace period'),
  }),
  cache: z.object({
    ttlSeconds: positiveInt('cache_ttl'),
    redisUrl: z.string().url('Invalid Redis URL').optional(),
    maxLocalEntries: positiveInt('local cache size'),
    retryBackoffMs: z.number().int().min(0),
  }),
  jobs: z.object({
    retentionMinutes: positiveInt('job_retention'),
    dbPath: z.string().min(1).optional(),
  }),
  uploads: z.object({
    dir: z.string().min(1),
    maxUploadMb: z.number().min(1).max(100),
    outputDir: z.string().min(1),
  }),
  mcp: z.object({
    enabled: z.boolean(),
  }),
});

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --max-concurrency 4 --port 8080 --debug
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Build configuration from CLI arguments, then environment, then defaults.
 * Throws a ZodError when the result is invalid.
 */
export function parseConfig(argv: string[], env: NodeJS.ProcessEnv): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getOptionalString = (cliKey: string, envKey: string): string | undefined => {
    const value = getString(cliKey, envKey, '');
    return value === '' ? undefined : value;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return Number(cliValue);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'vidgen-orchestrator'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
      port: getNumber('port', 'PORT', 8000),
    },
    provider: {
      apiKey: getString('fal-key', 'FAL_KEY', ''),
      queueUrl: getString('fal-queue-url', 'FAL_QUEUE_URL', 'https://queue.fal.run'),
      pollIntervalMs: getNumber('poll-interval', 'FAL_POLL_INTERVAL_MS', 2000),
      callTimeoutMs: getNumber('call-timeout', 'CALL_TIMEOUT_MS', 600000),
    },
    queue: {
      maxConcurrency: getNumber('max-concurrency', 'MAX_CONCURRENCY', 10),
      maxQueueSize: getNumber('max-queue-size', 'MAX_QUEUE_SIZE', 100),
      maxRetryAttempts: getNumber('max-retry-attempts', 'MAX_RETRY_ATTEMPTS', 3),
      retryBackoffBaseMs: getNumber('retry-backoff-base', 'RETRY_BACKOFF_BASE_MS', 1000),
      retryMaxDelayMs: getNumber('retry-max-delay', 'RETRY_MAX_DELAY_MS', 30000),
    },
    rateLimit: {
      windowSeconds: getNumber('rate-limit-window', 'RATE_LIMIT_WINDOW_SECONDS', 60),
      upload: getNumber('rate-limit-upload', 'RATE_LIMIT_UPLOAD', 10),
      generate: getNumber('rate-limit-generate', 'RATE_LIMIT_GENERATE', 5),
      api: getNumber('rate-limit-api', 'RATE_LIMIT_API', 60),
      maxBlockSeconds: getNumber('rate-limit-max-block', 'RATE_LIMIT_MAX_BLOCK_SECONDS', 900),
      violationGraceSeconds: getNumber('rate-limit-grace', 'RATE_LIMIT_GRACE_SECONDS', 600),
    },
    cache: {
      ttlSeconds: getNumber('cache-ttl', 'CACHE_TTL_SECONDS', 3600),
      redisUrl: getOptionalString('redis-url', 'REDIS_URL'),
      maxLocalEntries: getNumber('cache-local-entries', 'CACHE_LOCAL_ENTRIES', 1000),
      retryBackoffMs: getNumber('cache-retry-backoff', 'CACHE_RETRY_BACKOFF_MS', 30000),
    },
    jobs: {
      retentionMinutes: getNumber('job-retention', 'JOB_RETENTION_MINUTES', 60),
      dbPath: getOptionalString('job-db', 'JOB_DB_PATH'),
    },
    uploads: {
      dir: path.resolve(getString('upload-dir', 'UPLOAD_DIR', 'uploads')),
      maxUploadMb: getNumber('max-upload-mb', 'MAX_UPLOAD_MB', 10),
      outputDir: path.resolve(getString('output-dir', 'OUTPUT_DIR', 'outputs')),
    },
    mcp: {
      enabled: getBoolean('mcp', 'MCP_ENABLED', false),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Get configuration from the process, exiting with a report when invalid
 */
export function getConfig(): Config {
  try {
    return parseConfig(process.argv, process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.errors.forEach((err) => {
        const errPath = err.path.join('.');
        console.error(`  • ${errPath || 'root'}: ${err.message}`);
      });
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - Numbers must be plain integers (e.g. MAX_CONCURRENCY=10)');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  console.error('─'.repeat(68));
  console.error(`📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🔗 Provider: ${config.provider.queueUrl} ${config.provider.apiKey ? '' : '(FAL_KEY missing)'}`);
  console.error(
    `⚙️  Queue: ${config.queue.maxConcurrency} concurrent, ${config.queue.maxQueueSize} waiting max | ` +
      `Retry: ${config.queue.maxRetryAttempts}x from ${config.queue.retryBackoffBaseMs}ms | ` +
      `Timeout: ${config.provider.callTimeoutMs}ms`
  );
  console.error(
    `🚦 Rate limits per ${config.rateLimit.windowSeconds}s: upload ${config.rateLimit.upload}, ` +
      `generate ${config.rateLimit.generate}, api ${config.rateLimit.api}`
  );
  console.error(
    `💾 Cache: ${config.cache.redisUrl ? 'Redis + local' : 'local only'}, TTL ${config.cache.ttlSeconds}s | ` +
      `Jobs kept ${config.jobs.retentionMinutes}m${config.jobs.dbPath ? ` (mirrored to ${config.jobs.dbPath})` : ''}`
  );
  console.error(`🌐 HTTP: port ${config.server.port} | MCP stdio: ${config.mcp.enabled ? 'on' : 'off'}`);
  console.error('─'.repeat(68));
}
