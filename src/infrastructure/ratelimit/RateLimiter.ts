import { AdmissionDecision, RateLimitState, RouteClass } from '../../core/entities/RateLimit.js';
import { Logger, silentLogger } from '../../utils/logger.js';

export interface RateLimitPolicy {
  limit: number;
  windowSeconds: number;
}

export interface RateLimiterOptions {
  policies: Record<RouteClass, RateLimitPolicy>;
  maxBlockSeconds: number;
  violationGraceSeconds: number;
  sweepIntervalMs: number;
  now: () => number;
  logger: Logger;
}

export const DEFAULT_RATE_LIMIT_POLICIES: Record<RouteClass, RateLimitPolicy> = {
  upload: { limit: 10, windowSeconds: 60 },
  generate: { limit: 5, windowSeconds: 60 },
  api: { limit: 60, windowSeconds: 60 },
};

/**
 * Sliding-log rate limiter keyed by route class and caller identity.
 *
 * Only admitted requests are logged, so a client hammering a closed door
 * does not push its own window forward. Repeated breaches inside the grace
 * period double the block each time, up to `maxBlockSeconds`. State is
 * per process; several instances each enforce their own limits.
 */
export class RateLimiter {
  private readonly options: RateLimiterOptions;
  private states: Map<string, RateLimitState> = new Map();
  private lastSweepAt: number;

  constructor(options: Partial<RateLimiterOptions> = {}) {
    this.options = {
      policies: DEFAULT_RATE_LIMIT_POLICIES,
      maxBlockSeconds: 900,
      violationGraceSeconds: 600,
      sweepIntervalMs: 60000,
      now: Date.now,
      logger: silentLogger,
      ...options,
    };
    this.lastSweepAt = this.options.now();
  }

  admit(identity: string, routeClass: RouteClass): AdmissionDecision {
    const now = this.options.now();
    this.maybeSweep(now);

    const key = `${routeClass}:${identity}`;
    let state = this.states.get(key);
    if (!state) {
      state = {
        identity,
        routeClass,
        admitted: [],
        blockedUntil: 0,
        violations: 0,
        lastViolationAt: 0,
        lastSeenAt: now,
      };
      this.states.set(key, state);
    }
    state.lastSeenAt = now;

    if (now < state.blockedUntil) {
      return {
        allowed: false,
        retryAfterSeconds: Math.ceil((state.blockedUntil - now) / 1000),
        reason: 'blocked',
      };
    }

    const policy = this.options.policies[routeClass];
    const windowMs = policy.windowSeconds * 1000;
    while (state.admitted.length > 0 && state.admitted[0] <= now - windowMs) {
      state.admitted.shift();
    }

    if (state.admitted.length < policy.limit) {
      state.admitted.push(now);
      return { allowed: true, remaining: policy.limit - state.admitted.length };
    }

    const untilFreeMs = Math.max(state.admitted[0] + windowMs - now, 1000);
    const withinGrace =
      state.violations > 0 && now - state.lastViolationAt <= this.options.violationGraceSeconds * 1000;
    state.violations = withinGrace ? state.violations + 1 : 1;
    state.lastViolationAt = now;

    const blockMs = Math.min(
      untilFreeMs * Math.pow(2, state.violations - 1),
      this.options.maxBlockSeconds * 1000
    );
    state.blockedUntil = now + blockMs;

    this.options.logger.warn(
      `Rate limit exceeded for ${key} (violation ${state.violations}), blocked for ${Math.ceil(blockMs / 1000)}s`
    );

    return {
      allowed: false,
      retryAfterSeconds: Math.ceil(blockMs / 1000),
      reason: 'limit_exceeded',
    };
  }

  getStatistics() {
    const now = this.options.now();
    let blocked = 0;
    for (const state of this.states.values()) {
      if (now < state.blockedUntil) blocked++;
    }
    return {
      trackedKeys: this.states.size,
      blockedKeys: blocked,
    };
  }

  private maybeSweep(now: number): void {
    if (now - this.lastSweepAt < this.options.sweepIntervalMs) return;
    this.lastSweepAt = now;

    const graceMs = this.options.violationGraceSeconds * 1000;
    for (const [key, state] of this.states.entries()) {
      const windowMs = this.options.policies[state.routeClass].windowSeconds * 1000;
      if (now >= state.blockedUntil && now - state.lastSeenAt > Math.max(windowMs, graceMs)) {
        this.states.delete(key);
      }
    }
  }
}
