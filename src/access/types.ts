import { Identity, PrivilegeLevel } from '../credentials/types';

export type RoutePolicy =
  | { kind: 'none' }
  | { kind: 'password'; secret: string }
  | { kind: 'token'; minPrivilege: PrivilegeLevel };

export type RateBudgetConfig = {
  maxRequests: number;
  windowSeconds: number;
};

// Budgets with different scopes never share counters.
export type RateBudget = RateBudgetConfig & {
  scope: string;
};

export type RouteDefinition = {
  path: string;
  policy: RoutePolicy;
  rateLimit?: RateBudgetConfig;
};

export type RateLimitResult = {
  allowed: boolean;
  limit: number;
  remaining: number;
  // Seconds until the window closes, at least 1.
  retryAfter: number;
  // Unix time in seconds.
  resetAt: number;
};

export type RejectionReason = 'RateExceeded' | 'InvalidCredentials' | 'InsufficientPrivilege';

export type AccessCredentials = {
  password?: string;
  bearerToken?: string;
  apiKey?: string;
};

export type AccessOutcome =
  | { decision: 'allow'; identity: Identity | null; rateLimit: RateLimitResult }
  | { decision: 'reject'; reason: RejectionReason; rateLimit: RateLimitResult };
