import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';

import { CredentialsModule } from '../credentials/credentials.module';
import { StoreModule } from '../store/store.module';
import { StoreService } from '../store/store.service';
import { TokensModule } from '../tokens/tokens.module';
import { AccessGuard } from './access.guard';
import { MemoryRateBudgetStore } from './memory-rate-budget.store';
import { RATE_BUDGET_STORE, RateBudgetStore } from './rate-budget.store';
import { RateLimiterService } from './rate-limiter.service';
import { RedisRateBudgetStore } from './redis-rate-budget.store';
import { RequestMediatorService } from './request-mediator.service';
import { ROUTE_TABLE, RoutePolicyRegistry } from './route-policy.registry';
import { buildRouteTable } from './route-table';
import { RouteDefinition } from './types';

@Module({
  imports: [StoreModule, CredentialsModule, TokensModule],
  providers: [
    {
      provide: RATE_BUDGET_STORE,
      inject: [ConfigService, StoreService],
      useFactory: (configService: ConfigService, storeService: StoreService): RateBudgetStore => {
        const kind = configService.get<string>('RATE_LIMIT_STORE') ?? 'memory';
        new Logger(AccessModule.name).log(`Using ${kind} rate budget store`);
        return kind === 'redis' ? new RedisRateBudgetStore(storeService) : new MemoryRateBudgetStore();
      },
    },
    {
      provide: ROUTE_TABLE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): RouteDefinition[] =>
        buildRouteTable({
          demoRoutePassword: configService.get<string>('DEMO_ROUTE_PASSWORD') ?? '',
          authBudget: {
            maxRequests: configService.get<number>('AUTH_RATE_LIMIT_MAX_REQUESTS') ?? 10,
            windowSeconds: configService.get<number>('AUTH_RATE_LIMIT_WINDOW_SECONDS') ?? 60,
          },
        }),
    },
    RoutePolicyRegistry,
    RateLimiterService,
    RequestMediatorService,
    AccessGuard,
    { provide: APP_GUARD, useExisting: AccessGuard },
  ],
  exports: [RoutePolicyRegistry, RateLimiterService, RequestMediatorService],
})
export class AccessModule {}
