import { Redis } from 'ioredis';
import { IExternalCache } from '../../core/interfaces/IExternalCache.js';
import { Logger, silentLogger } from '../../utils/logger.js';

/**
 * Redis-backed shared cache. The offline queue is disabled so that commands
 * fail at once while the server is unreachable instead of piling up; the
 * cache store then falls back to its local copy.
 */
export class RedisExternalCache implements IExternalCache {
  private client: Redis;

  constructor(url: string, private logger: Logger = silentLogger) {
    this.client = new Redis(url, {
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
      connectTimeout: 2000,
    });

    this.client.on('error', (error: Error) => {
      this.logger.debug(`Redis error: ${error.message}`);
    });
    this.client.on('ready', () => {
      this.logger.info(`✓ Connected to Redis at ${redactUrl(url)}`);
    });
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.set(key, value, 'EX', ttlSeconds);
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG';
    } catch (error) {
      this.logger.debug('Redis ping failed', error);
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.client.status === 'end') return;
    try {
      await this.client.quit();
    } catch (error) {
      this.logger.debug('Redis quit failed, disconnecting', error);
      this.client.disconnect();
    }
  }
}

function redactUrl(url: string): string {
  return url.replace(/\/\/[^@/]*@/, '//***@');
}
