import { LRUCache } from 'lru-cache';
import { z } from 'zod';
import { CacheEntry, isExpired } from '../../core/entities/CacheEntry.js';
import { GenerationResult } from '../../core/entities/Job.js';
import { IExternalCache } from '../../core/interfaces/IExternalCache.js';
import { Logger, silentLogger } from '../../utils/logger.js';

export interface CacheStoreOptions {
  defaultTtlSeconds: number;
  maxLocalEntries: number;
  retryBackoffMs: number;
  namespace: string;
  now: () => number;
  logger: Logger;
}

export type ExternalCacheState = 'none' | 'up' | 'down';

export interface CacheStats {
  hits: number;
  misses: number;
  writes: number;
  errors: number;
  localSize: number;
  pending: number;
  external: ExternalCacheState;
}

const DEFAULT_OPTIONS: CacheStoreOptions = {
  defaultTtlSeconds: 3600,
  maxLocalEntries: 1000,
  retryBackoffMs: 30000,
  namespace: 'vidgen:cache',
  now: Date.now,
  logger: silentLogger,
};

const StoredEntrySchema = z.object({
  fingerprint: z.string(),
  result: z.object({
    videoUrl: z.string(),
    providerRequestId: z.string().optional(),
    seed: z.number().optional(),
    contentType: z.string().optional(),
    fileSize: z.number().optional(),
  }),
  createdAt: z.number(),
  ttlSeconds: z.number().positive(),
});

/**
 * Result cache keyed by fingerprint.
 *
 * Reads go to the external cache first and fall back to the local LRU, which
 * receives every write. An external failure never reaches the caller: the
 * backend is skipped for `retryBackoffMs` and the local copy answers.
 *
 * Writes and deletes the external cache missed are kept as pending and
 * replayed once it is reachable again. Until then a pending fingerprint is
 * answered locally, so a stale external copy never resurfaces.
 */
export class CacheStore {
  private readonly options: CacheStoreOptions;
  private readonly local: LRUCache<string, CacheEntry>;
  private externalDownUntil = 0;
  private pending: Map<string, CacheEntry | null> = new Map();
  private stats = { hits: 0, misses: 0, writes: 0, errors: 0 };

  constructor(
    private readonly external: IExternalCache | null,
    options: Partial<CacheStoreOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.local = new LRUCache<string, CacheEntry>({ max: this.options.maxLocalEntries });
  }

  async get(fingerprint: string): Promise<CacheEntry | null> {
    let entry: CacheEntry | null = null;

    if (this.external && this.isExternalUsable() && this.pending.size > 0) {
      await this.replayPending(this.external);
    }

    const pendingEntry = this.pending.get(fingerprint);
    if (pendingEntry !== undefined) {
      entry = pendingEntry;
    } else if (this.external && this.isExternalUsable()) {
      try {
        const raw = await this.external.get(this.key(fingerprint));
        entry = raw === null ? null : this.decode(fingerprint, raw);
      } catch (error) {
        this.markExternalDown('get', error);
      }
    }

    if (entry === null && pendingEntry === undefined) {
      entry = this.local.get(fingerprint) ?? null;
    } else if (entry !== null && !this.local.has(fingerprint)) {
      this.local.set(fingerprint, entry);
    }

    if (entry !== null && isExpired(entry, this.options.now())) {
      this.local.delete(fingerprint);
      entry = null;
    }

    if (entry === null) {
      this.stats.misses++;
    } else {
      this.stats.hits++;
    }
    return entry;
  }

  /**
   * Stores a result. Returns false when an unexpired entry with the same
   * payload and TTL is already present, true when something was written.
   */
  async put(
    fingerprint: string,
    result: GenerationResult,
    ttlSeconds: number = this.options.defaultTtlSeconds
  ): Promise<boolean> {
    const now = this.options.now();
    const existing = this.local.get(fingerprint);
    if (
      existing &&
      !isExpired(existing, now) &&
      existing.ttlSeconds === ttlSeconds &&
      sameResult(existing.result, result)
    ) {
      return false;
    }

    const entry: CacheEntry = Object.freeze({
      fingerprint,
      result: Object.freeze({ ...result }),
      createdAt: now,
      ttlSeconds,
    });
    this.local.set(fingerprint, entry);
    this.stats.writes++;

    if (this.external) {
      this.pending.set(fingerprint, entry);
      if (this.isExternalUsable()) {
        try {
          await this.external.set(this.key(fingerprint), JSON.stringify(entry), ttlSeconds);
          this.settle(fingerprint, entry);
        } catch (error) {
          this.markExternalDown('set', error);
        }
      }
    }

    this.options.logger.debug(`Cached result for ${fingerprint.slice(0, 12)} (ttl ${ttlSeconds}s)`);
    return true;
  }

  async invalidate(fingerprint: string): Promise<boolean> {
    const existed = this.local.delete(fingerprint);

    if (this.external) {
      this.pending.set(fingerprint, null);
      if (this.isExternalUsable()) {
        try {
          await this.external.delete(this.key(fingerprint));
          this.settle(fingerprint, null);
        } catch (error) {
          this.markExternalDown('delete', error);
        }
      }
    }

    return existed;
  }

  /**
   * Ping the external cache. A successful ping ends the backoff early, so
   * pending changes are replayed on the next read.
   */
  async checkExternal(): Promise<ExternalCacheState> {
    if (!this.external) return 'none';

    let reachable: boolean;
    try {
      reachable = await this.external.ping();
    } catch (error) {
      this.markExternalDown('ping', error);
      return 'down';
    }

    if (!reachable) {
      this.markExternalDown('ping', new Error('no PONG'));
      return 'down';
    }
    this.externalDownUntil = 0;
    return 'up';
  }

  getStats(): CacheStats {
    return {
      ...this.stats,
      localSize: this.local.size,
      pending: this.pending.size,
      external: this.externalState(),
    };
  }

  /**
   * Push the writes and deletes the external cache missed, oldest first.
   * Stops at the first failure; what is left stays pending.
   */
  private async replayPending(external: IExternalCache): Promise<void> {
    for (const [fingerprint, entry] of Array.from(this.pending.entries())) {
      const now = this.options.now();
      try {
        if (entry === null || isExpired(entry, now)) {
          await external.delete(this.key(fingerprint));
        } else {
          const remainingSeconds = Math.ceil((entry.createdAt + entry.ttlSeconds * 1000 - now) / 1000);
          await external.set(this.key(fingerprint), JSON.stringify(entry), remainingSeconds);
        }
      } catch (error) {
        this.markExternalDown('replay', error);
        return;
      }
      this.settle(fingerprint, entry);
    }
    this.options.logger.info('External cache reachable again, pending changes replayed');
  }

  // A newer write or delete that arrived during the await stays pending.
  private settle(fingerprint: string, entry: CacheEntry | null): void {
    if (this.pending.get(fingerprint) === entry) {
      this.pending.delete(fingerprint);
    }
  }

  private externalState(): ExternalCacheState {
    if (!this.external) return 'none';
    return this.isExternalUsable() ? 'up' : 'down';
  }

  private isExternalUsable(): boolean {
    return this.options.now() >= this.externalDownUntil;
  }

  private markExternalDown(operation: string, error: unknown): void {
    this.stats.errors++;
    this.externalDownUntil = this.options.now() + this.options.retryBackoffMs;
    const reason = error instanceof Error ? error.message : String(error);
    this.options.logger.warn(
      `External cache ${operation} failed, using local cache for ${this.options.retryBackoffMs}ms: ${reason}`
    );
  }

  private key(fingerprint: string): string {
    return `${this.options.namespace}:${fingerprint}`;
  }

  private decode(fingerprint: string, raw: string): CacheEntry | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.options.logger.warn(`Ignoring unreadable cache entry for ${fingerprint.slice(0, 12)}`);
      return null;
    }

    const result = StoredEntrySchema.safeParse(parsed);
    if (!result.success || result.data.fingerprint !== fingerprint) {
      this.options.logger.warn(`Ignoring malformed cache entry for ${fingerprint.slice(0, 12)}`);
      return null;
    }
    return Object.freeze({ ...result.data, result: Object.freeze(result.data.result) });
  }
}

function sameResult(a: GenerationResult, b: GenerationResult): boolean {
  return (
    a.videoUrl === b.videoUrl &&
    a.providerRequestId === b.providerRequestId &&
    a.seed === b.seed &&
    a.contentType === b.contentType &&
    a.fileSize === b.fileSize
  );
}
