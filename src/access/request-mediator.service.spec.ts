import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';

import { buildCacheManager, buildConfigService, InMemoryRedis } from '../../test/utils/in-memory-redis';
import { CredentialsService } from '../credentials/credentials.service';
import { Identity, Privilege } from '../credentials/types';
import { StoreService } from '../store/store.service';
import { TokensService } from '../tokens/tokens.service';
import { MemoryRateBudgetStore } from './memory-rate-budget.store';
import { RATE_BUDGET_STORE } from './rate-budget.store';
import { RateLimiterService } from './rate-limiter.service';
import { RequestMediatorService } from './request-mediator.service';
import { RouteDefinition } from './types';

describe('RequestMediatorService', () => {
  const client = '192.0.2.44';
  const openRoute: RouteDefinition = { path: '/guest-demo', policy: { kind: 'none' } };
  const passwordRoute: RouteDefinition = {
    path: '/protected',
    policy: { kind: 'password', secret: 'Password123' },
  };
  const userRoute: RouteDefinition = {
    path: '/users/me',
    policy: { kind: 'token', minPrivilege: Privilege.User },
  };
  const adminRoute: RouteDefinition = {
    path: '/admin-demo',
    policy: { kind: 'token', minPrivilege: Privilege.Admin },
  };

  let redis: InMemoryRedis;
  let mediator: RequestMediatorService;
  let tokens: TokensService;
  let credentials: CredentialsService;
  let user: Identity;

  const createMediator = async (config: Record<string, unknown> = {}): Promise<void> => {
    redis = new InMemoryRedis();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RequestMediatorService,
        RateLimiterService,
        TokensService,
        CredentialsService,
        StoreService,
        { provide: RATE_BUDGET_STORE, useValue: new MemoryRateBudgetStore() },
        { provide: CACHE_MANAGER, useValue: buildCacheManager(redis) },
        {
          provide: ConfigService,
          useValue: buildConfigService({
            STORE_KEY_PREFIX: 'test-gatehouse',
            BCRYPT_ROUNDS: 4,
            JWT_SECRET: 'test-secret-test-secret-test-secret',
            JWT_ISSUER: 'gatehouse-test',
            RATE_LIMIT_MAX_REQUESTS: 50,
            RATE_LIMIT_WINDOW_SECONDS: 60,
            ...config,
          }),
        },
      ],
    }).compile();

    mediator = module.get<RequestMediatorService>(RequestMediatorService);
    tokens = module.get<TokensService>(TokensService);
    credentials = module.get<CredentialsService>(CredentialsService);

    user = credentials.toIdentity(
      await credentials.createUser('ada@example.com', 'correct-horse', Privilege.User),
    );
  };

  beforeEach(async () => {
    await createMediator();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('open routes', () => {
    it('forwards without an identity', async () => {
      await expect(mediator.mediate(openRoute, client, {})).resolves.toEqual({
        decision: 'allow',
        identity: null,
        rateLimit: expect.objectContaining({ allowed: true, limit: 50, remaining: 49 }),
      });
    });
  });

  describe('password routes', () => {
    it('forwards with the right password', async () => {
      await expect(mediator.mediate(passwordRoute, client, { password: 'Password123' })).resolves.toEqual(
        expect.objectContaining({ decision: 'allow', identity: null }),
      );
    });

    it('rejects a case-mismatched password', async () => {
      await expect(mediator.mediate(passwordRoute, client, { password: 'password123' })).resolves.toEqual(
        expect.objectContaining({ decision: 'reject', reason: 'InvalidCredentials' }),
      );
    });

    it('rejects requests without a password', async () => {
      await expect(mediator.mediate(passwordRoute, client, {})).resolves.toEqual(
        expect.objectContaining({ decision: 'reject', reason: 'InvalidCredentials' }),
      );
    });
  });

  describe('token routes', () => {
    it('forwards a valid access token with its identity', async () => {
      const bearerToken = tokens.issueAccessToken(user);

      await expect(mediator.mediate(userRoute, client, { bearerToken })).resolves.toEqual(
        expect.objectContaining({ decision: 'allow', identity: user }),
      );
    });

    it('rejects insufficient privilege after a valid credential', async () => {
      const bearerToken = tokens.issueAccessToken(user);

      await expect(mediator.mediate(adminRoute, client, { bearerToken })).resolves.toEqual(
        expect.objectContaining({ decision: 'reject', reason: 'InsufficientPrivilege' }),
      );
    });

    it('treats the requirement as inclusive', async () => {
      const operator: Identity = { ...user, privilege: 5 };
      const bearerToken = tokens.issueAccessToken(operator);
      const levelFive: RouteDefinition = { path: '/five', policy: { kind: 'token', minPrivilege: 5 } };
      const levelSix: RouteDefinition = { path: '/six', policy: { kind: 'token', minPrivilege: 6 } };

      await expect(mediator.mediate(levelFive, client, { bearerToken })).resolves.toEqual(
        expect.objectContaining({ decision: 'allow', identity: operator }),
      );
      await expect(mediator.mediate(levelSix, client, { bearerToken })).resolves.toEqual(
        expect.objectContaining({ decision: 'reject', reason: 'InsufficientPrivilege' }),
      );
    });

    it('rejects missing and invalid tokens', async () => {
      await expect(mediator.mediate(userRoute, client, {})).resolves.toEqual(
        expect.objectContaining({ decision: 'reject', reason: 'InvalidCredentials' }),
      );
      await expect(mediator.mediate(userRoute, client, { bearerToken: 'not-a-jwt' })).resolves.toEqual(
        expect.objectContaining({ decision: 'reject', reason: 'InvalidCredentials' }),
      );
    });

    it('rejects refresh tokens used as bearer credentials', async () => {
      const bearerToken = await tokens.issueRefreshToken(user);

      await expect(mediator.mediate(userRoute, client, { bearerToken })).resolves.toEqual(
        expect.objectContaining({ decision: 'reject', reason: 'InvalidCredentials' }),
      );
    });

    it('accepts API keys from the x-api-key header', async () => {
      const apiKey = await credentials.rotateApiKey(user.userId);

      await expect(mediator.mediate(userRoute, client, { apiKey })).resolves.toEqual(
        expect.objectContaining({ decision: 'allow', identity: user }),
      );
    });

    it('accepts API keys sent as bearer credentials', async () => {
      const apiKey = await credentials.rotateApiKey(user.userId);

      await expect(mediator.mediate(userRoute, client, { bearerToken: apiKey })).resolves.toEqual(
        expect.objectContaining({ decision: 'allow', identity: user }),
      );
    });

    it('rejects unknown API keys', async () => {
      await expect(mediator.mediate(userRoute, client, { apiKey: 'ak_unknown' })).resolves.toEqual(
        expect.objectContaining({ decision: 'reject', reason: 'InvalidCredentials' }),
      );
    });

    it('propagates store failures instead of rejecting the credential', async () => {
      const apiKey = await credentials.rotateApiKey(user.userId);
      const outage = new Error('connection lost');
      jest.spyOn(redis, 'get').mockRejectedValueOnce(outage);

      await expect(mediator.mediate(userRoute, client, { apiKey })).rejects.toBe(outage);
    });
  });

  describe('rate limiting', () => {
    it('rejects over-budget requests before looking at credentials', async () => {
      await createMediator({ RATE_LIMIT_MAX_REQUESTS: 1 });
      const bearerToken = tokens.issueAccessToken(user);
      await mediator.mediate(userRoute, client, { bearerToken });
      const validateSpy = jest.spyOn(tokens, 'validateAccessToken');

      const outcome = await mediator.mediate(userRoute, client, { bearerToken });

      expect(outcome).toEqual({
        decision: 'reject',
        reason: 'RateExceeded',
        rateLimit: expect.objectContaining({ allowed: false, limit: 1, remaining: 0 }),
      });
      expect(validateSpy).not.toHaveBeenCalled();
    });

    it('charges requests that fail authentication', async () => {
      await createMediator({ RATE_LIMIT_MAX_REQUESTS: 2 });

      await mediator.mediate(userRoute, client, {});
      await mediator.mediate(userRoute, client, {});

      await expect(mediator.mediate(openRoute, client, {})).resolves.toEqual(
        expect.objectContaining({ decision: 'reject', reason: 'RateExceeded' }),
      );
    });

    it('uses the route budget when one is configured', async () => {
      const loginRoute: RouteDefinition = {
        path: '/auth/login',
        policy: { kind: 'none' },
        rateLimit: { maxRequests: 1, windowSeconds: 60 },
      };

      await expect(mediator.mediate(loginRoute, client, {})).resolves.toEqual(
        expect.objectContaining({ decision: 'allow' }),
      );
      await expect(mediator.mediate(loginRoute, client, {})).resolves.toEqual(
        expect.objectContaining({ decision: 'reject', reason: 'RateExceeded' }),
      );
      await expect(mediator.mediate(openRoute, client, {})).resolves.toEqual(
        expect.objectContaining({ decision: 'allow' }),
      );
    });
  });
});
