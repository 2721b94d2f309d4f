import { Logger } from '@nestjs/common';

import { StoreService } from '../store/store.service';
import { hashKeyForLogging } from '../utils/hash';
import { RateBudgetStore, RateWindow } from './rate-budget.store';

/**
 * Budget table shared by every instance through Redis. INCR is atomic on
 * the server; the first hit of a window sets its expiry.
 */
export class RedisRateBudgetStore implements RateBudgetStore {
  private readonly logger = new Logger(RedisRateBudgetStore.name);

  constructor(private readonly storeService: StoreService) {}

  async hit(scope: string, clientKey: string, windowMs: number): Promise<RateWindow> {
    const redis = this.storeService.getClient();
    const counterKey = this.storeService.key('rate', scope, clientKey);

    const count = await redis.incr(counterKey);
    if (count === 1) {
      await redis.pExpire(counterKey, windowMs);
    }

    let ttl = await redis.pTTL(counterKey);
    if (ttl < 0) {
      // A counter without expiry would never reset (the PEXPIRE after INCR was lost).
      this.logger.warn(`Rate counter ${hashKeyForLogging(counterKey)} had no expiry; resetting it`);
      await redis.pExpire(counterKey, windowMs);
      ttl = windowMs;
    }

    return { count, resetAtMs: Date.now() + ttl };
  }
}
