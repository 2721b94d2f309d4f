import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { RATE_BUDGET_STORE, RateBudgetStore } from './rate-budget.store';
import { RateBudget, RateLimitResult } from './types';

const DEFAULT_SCOPE = 'default';

@Injectable()
export class RateLimiterService {
  private readonly logger = new Logger(RateLimiterService.name);
  private readonly defaultBudget: RateBudget;

  constructor(
    @Inject(RATE_BUDGET_STORE) private readonly store: RateBudgetStore,
    private readonly configService: ConfigService,
  ) {
    this.defaultBudget = {
      scope: DEFAULT_SCOPE,
      maxRequests: this.parsePositiveInteger(
        this.configService.get<unknown>('RATE_LIMIT_MAX_REQUESTS'),
        120,
        'RATE_LIMIT_MAX_REQUESTS',
      ),
      windowSeconds: this.parsePositiveInteger(
        this.configService.get<unknown>('RATE_LIMIT_WINDOW_SECONDS'),
        60,
        'RATE_LIMIT_WINDOW_SECONDS',
      ),
    };
  }

  /**
   * Charges one request to `clientKey`. Rejected requests are counted as
   * well, so a client hammering a closed window does not extend its budget.
   */
  async admit(clientKey: string, budget: RateBudget = this.defaultBudget): Promise<RateLimitResult> {
    const { scope, maxRequests, windowSeconds } = budget;
    const window = await this.store.hit(scope, clientKey, windowSeconds * 1000);
    const now = Date.now();

    return {
      allowed: window.count <= maxRequests,
      limit: maxRequests,
      remaining: Math.max(0, maxRequests - window.count),
      retryAfter: Math.max(1, Math.ceil((window.resetAtMs - now) / 1000)),
      resetAt: Math.ceil(window.resetAtMs / 1000),
    };
  }

  getDefaultBudget(): RateBudget {
    return { ...this.defaultBudget };
  }

  private parsePositiveInteger(value: unknown, fallback: number, fieldName: string): number {
    const parsed = typeof value === 'number' ? value : Number(value);
    if (Number.isInteger(parsed) && parsed > 0) {
      return parsed;
    }

    if (value !== undefined) {
      this.logger.warn(`${fieldName} is invalid; using fallback ${fallback}`);
    }
    return fallback;
  }
}
