/**
 * Rate limiting domain types
 */
export type RouteClass = 'upload' | 'generate' | 'api';

export type AdmissionDecision =
  | { allowed: true; remaining: number }
  | { allowed: false; retryAfterSeconds: number; reason: 'limit_exceeded' | 'blocked' };

export interface RateLimitState {
  identity: string;
  routeClass: RouteClass;
  // Admission times (epoch ms) inside the current window, oldest first
  admitted: number[];
  blockedUntil: number;
  violations: number;
  lastViolationAt: number;
  lastSeenAt: number;
}
