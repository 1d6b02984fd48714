/**
 * Retry and Circuit Breaker patterns for calls to the video provider
 */
import { CancelledError, ProviderError, RetryExhaustedError, TimeoutError } from '../core/errors.js';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  timeoutMs: number;
  jitter: boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  multiplier: 2,
  timeoutMs: 600000,
  jitter: true,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  retryable?: boolean;
  nextRetryInMs?: number;
}

export interface RetryHooks {
  shouldRetry?: (error: unknown) => boolean;
  isCancelled?: () => boolean;
  onLog?: (log: RetryLog) => void;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Backoff before the attempt following `attempt` (1-based). With jitter the
 * delay is drawn from [base/2, base].
 */
export function computeBackoffDelay(
  attempt: number,
  config: Pick<RetryConfig, 'initialDelayMs' | 'maxDelayMs' | 'multiplier' | 'jitter'>,
  random: () => number = Math.random
): number {
  const base = Math.min(config.initialDelayMs * Math.pow(config.multiplier, attempt - 1), config.maxDelayMs);
  if (!config.jitter) {
    return base;
  }
  return Math.round(base / 2 + random() * (base / 2));
}

/**
 * Runs `fn` with a hard deadline. On expiry the signal handed to `fn` is
 * aborted and the returned promise rejects with a TimeoutError; `fn` itself
 * may keep running until it notices the signal.
 */
export async function runWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Executes a function with exponential backoff retry logic.
 *
 * Non-retryable errors are rethrown as they are. When every attempt failed
 * with a retryable error a RetryExhaustedError wrapping the last one is
 * thrown. Cancellation is observed before each attempt and after each
 * backoff.
 */
export async function withRetry<T>(
  fn: (attempt: number, signal: AbortSignal) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  hooks: RetryHooks = {}
): Promise<T> {
  const shouldRetry = hooks.shouldRetry ?? isRetryableError;
  const wait = hooks.sleep ?? sleep;
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    if (hooks.isCancelled?.()) {
      throw new CancelledError();
    }

    try {
      const result = await runWithTimeout((signal) => fn(attempt, signal), config.timeoutMs);

      hooks.onLog?.({
        timestamp: new Date(),
        attempt,
        delay: 0,
        success: true,
      });

      return result;
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }

      lastError = error;
      const retryable = shouldRetry(error);
      const hasNext = retryable && attempt < config.maxAttempts;
      const delay = hasNext ? computeBackoffDelay(attempt, config, hooks.random) : 0;

      hooks.onLog?.({
        timestamp: new Date(),
        attempt,
        delay,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        retryable,
        nextRetryInMs: hasNext ? delay : undefined,
      });

      if (!retryable) {
        throw error;
      }
      if (!hasNext) {
        break;
      }

      await wait(delay);
    }
  }

  throw new RetryExhaustedError(config.maxAttempts, lastError);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

type CircuitState = 'closed' | 'open' | 'half-open';

/**
 * Circuit Breaker Pattern
 * Stops calling the provider for `resetTimeoutMs` once `failureThreshold`
 * consecutive-ish failures were seen. Only retryable failures count: a
 * rejected prompt says nothing about provider health.
 */
export class CircuitBreaker {
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private state: CircuitState = 'closed';
  private logs: Array<{ timestamp: Date; state: CircuitState; reason: string }> = [];

  constructor(
    private failureThreshold: number = 5,
    private resetTimeoutMs: number = 60000,
    private now: () => number = Date.now
  ) {}

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'open') {
      const now = this.now();
      if (this.lastFailureTime !== null && now - this.lastFailureTime > this.resetTimeoutMs) {
        this.state = 'half-open';
        this.successCount = 0;
        this.logStateChange('half-open', 'Reset timeout reached');
      } else {
        const waitMs = this.resetTimeoutMs - (now - (this.lastFailureTime ?? now));
        throw new ProviderError(
          'circuit_open',
          `The video provider is temporarily unavailable. Try again in ${Math.ceil(waitMs / 1000)}s`
        );
      }
    }

    try {
      const result = await fn();

      if (this.state === 'half-open') {
        this.successCount++;
        if (this.successCount >= 2) {
          this.state = 'closed';
          this.failureCount = 0;
          this.logStateChange('closed', 'Recovered from temporary failure');
        }
      } else {
        this.failureCount = Math.max(0, this.failureCount - 1);
      }

      return result;
    } catch (error) {
      if (isRetryableError(error)) {
        this.onFailure();
      }
      throw error;
    }
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === 'half-open') {
      this.state = 'open';
      this.logStateChange('open', 'Failed while in half-open state');
    } else if (this.state === 'closed' && this.failureCount >= this.failureThreshold) {
      this.state = 'open';
      this.logStateChange('open', `Failure threshold (${this.failureThreshold}) reached`);
    }
  }

  private logStateChange(state: CircuitState, reason: string): void {
    this.logs.push({ timestamp: new Date(), state, reason });

    // Keep last 100 logs
    if (this.logs.length > 100) {
      this.logs = this.logs.slice(-100);
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats() {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime !== null ? new Date(this.lastFailureTime) : null,
      logs: this.logs,
    };
  }

  reset(): void {
    this.state = 'closed';
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    this.logStateChange('closed', 'Manual reset');
  }
}

/**
 * Check if an error is worth another attempt
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ProviderError) {
    return error.retryable;
  }
  if (error instanceof TimeoutError) {
    return true;
  }
  if (error instanceof CancelledError) {
    return false;
  }

  const errorMessage = error instanceof Error ? error.message.toLowerCase() : '';

  const retryablePatterns = [
    'timeout',
    'econnrefused',
    'econnreset',
    'etimedout',
    'service unavailable',
    'temporarily unavailable',
    'connection refused',
    'getaddrinfo enotfound',
    'socket hang up',
  ];

  return retryablePatterns.some((pattern) => errorMessage.includes(pattern));
}
