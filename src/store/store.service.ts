import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { Inject, Injectable, Logger, ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Cache } from 'cache-manager';

import { RedisClient, StoreHealth } from './types';

type StoreHandle = {
  client?: RedisClient;
  isFallback?: boolean;
};

@Injectable()
export class StoreService {
  private readonly logger = new Logger(StoreService.name);
  private readonly keyPrefix: string;

  constructor(
    @Inject(CACHE_MANAGER) private readonly cacheManager: Cache,
    private readonly configService: ConfigService,
  ) {
    this.keyPrefix = this.configService.get<string>('STORE_KEY_PREFIX') ?? 'gatehouse';
  }

  /**
   * Namespaced Redis key, e.g. `key('user', id)` → `gatehouse:user:<id>`.
   */
  key(...parts: string[]): string {
    return [this.keyPrefix, ...parts].join(':');
  }

  getClient(): RedisClient {
    const store = this.resolveStore();
    if (!store?.client || store.isFallback) {
      this.logger.error('Redis client unavailable for credential storage');
      throw new ServiceUnavailableException('Credential store unavailable');
    }

    return store.client;
  }

  async checkHealth(): Promise<StoreHealth> {
    try {
      const store = this.resolveStore();
      if (!store?.client || store.isFallback) {
        return { status: 'degraded', message: 'Store client unavailable' };
      }
      await store.client.ping();
      return { status: 'ok' };
    } catch (error) {
      this.logger.warn('Store health check failed');
      return { status: 'degraded', message: 'Store backend unreachable' };
    }
  }

  private resolveStore(): StoreHandle | null {
    const store: unknown = this.cacheManager.store;
    return this.isStoreHandle(store) ? store : null;
  }

  private isStoreHandle(value: unknown): value is StoreHandle {
    return typeof value === 'object' && value !== null && ('client' in value || 'isFallback' in value);
  }
}
