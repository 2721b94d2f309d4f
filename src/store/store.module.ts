import type { CacheStore } from '@nestjs/cache-manager';
import { CacheModule } from '@nestjs/cache-manager';
import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { redisStore } from 'cache-manager-redis-yet';

import { StoreService } from './store.service';

@Module({
  imports: [
    CacheModule.registerAsync({
      inject: [ConfigService],
      useFactory: async (configService: ConfigService) => {
        const logger = new Logger(StoreModule.name);
        const redisUrl = configService.get<string>('REDIS_URL') ?? '';

        const noopStore: CacheStore & { isFallback: boolean } = {
          get: async () => undefined,
          set: async () => undefined,
          del: async () => undefined,
          isFallback: true,
        };

        try {
          const store: CacheStore = await redisStore({ url: redisUrl });
          return { store };
        } catch (error) {
          // Credential operations answer 503 until the process is restarted with a reachable Redis.
          logger.warn('Redis unavailable; credential store runs on a no-op fallback.');
          return { store: noopStore };
        }
      },
    }),
  ],
  providers: [StoreService],
  exports: [StoreService],
})
export class StoreModule {}
