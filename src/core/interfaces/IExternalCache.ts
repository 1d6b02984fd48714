/**
 * Key-value service used as the shared result cache (Redis in production).
 * Implementations may throw on any call when the service is unreachable;
 * the cache store treats that as an outage, never as a request failure.
 */
export interface IExternalCache {
  get(key: string): Promise<string | null>;

  set(key: string, value: string, ttlSeconds: number): Promise<void>;

  delete(key: string): Promise<void>;

  ping(): Promise<boolean>;

  close(): Promise<void>;
}
