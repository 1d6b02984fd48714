import { GenerationResult } from './Job.js';

/**
 * Cached provider result. Entries are never mutated: a newer result for the
 * same fingerprint replaces the entry as a whole.
 */
export interface CacheEntry {
  fingerprint: string;
  result: GenerationResult;
  createdAt: number; // epoch ms
  ttlSeconds: number;
}

export function isExpired(entry: CacheEntry, now: number): boolean {
  return entry.createdAt + entry.ttlSeconds * 1000 <= now;
}
