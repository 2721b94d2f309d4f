import { Injectable, Logger } from '@nestjs/common';

import { CredentialsService } from '../credentials/credentials.service';
import { InvalidCredentialsError } from '../credentials/errors';
import { Identity } from '../credentials/types';
import { TokenError } from '../tokens/errors';
import { TokensService } from '../tokens/tokens.service';
import { hashKeyForLogging } from '../utils/hash';
import { checkPassword } from './password-verifier';
import { authorize } from './privilege-gate';
import { RateLimiterService } from './rate-limiter.service';
import { AccessCredentials, AccessOutcome, RateLimitResult, RejectionReason, RouteDefinition } from './types';

const API_KEY_PREFIX = 'ak_';

/**
 * Runs the per-request checks in a fixed order: rate budget, then the
 * credential the route policy asks for, then the privilege requirement.
 * The first failing step decides the outcome; nothing is retried.
 */
@Injectable()
export class RequestMediatorService {
  private readonly logger = new Logger(RequestMediatorService.name);

  constructor(
    private readonly rateLimiter: RateLimiterService,
    private readonly tokensService: TokensService,
    private readonly credentialsService: CredentialsService,
  ) {}

  async mediate(
    route: RouteDefinition,
    clientKey: string,
    credentials: AccessCredentials,
  ): Promise<AccessOutcome> {
    const rateLimit = await this.rateLimiter.admit(
      clientKey,
      route.rateLimit ? { scope: `route:${route.path}`, ...route.rateLimit } : undefined,
    );
    if (!rateLimit.allowed) {
      return this.reject(route, clientKey, 'RateExceeded', rateLimit);
    }

    const { policy } = route;
    switch (policy.kind) {
      case 'none':
        return { decision: 'allow', identity: null, rateLimit };

      case 'password':
        if (!checkPassword(policy.secret, credentials.password)) {
          return this.reject(route, clientKey, 'InvalidCredentials', rateLimit);
        }
        return { decision: 'allow', identity: null, rateLimit };

      case 'token': {
        const identity = await this.resolveIdentity(credentials);
        if (!identity) {
          return this.reject(route, clientKey, 'InvalidCredentials', rateLimit);
        }

        const decision = authorize(identity.privilege, policy.minPrivilege);
        if (!decision.allowed) {
          return this.reject(route, clientKey, decision.reason, rateLimit);
        }
        return { decision: 'allow', identity, rateLimit };
      }
    }
  }

  /**
   * Bearer values shaped like an API key and the `x-api-key` header go to the
   * credential store; any other bearer value is treated as an access token.
   */
  private async resolveIdentity(credentials: AccessCredentials): Promise<Identity | null> {
    const { bearerToken, apiKey } = credentials;

    if (bearerToken && !bearerToken.startsWith(API_KEY_PREFIX)) {
      try {
        return this.tokensService.validateAccessToken(bearerToken);
      } catch (error) {
        if (error instanceof TokenError) {
          this.logger.debug(`Access token rejected (${error.kind})`);
          return null;
        }
        throw error;
      }
    }

    const key = bearerToken ?? apiKey;
    if (!key) {
      return null;
    }

    try {
      return await this.credentialsService.lookupByApiKey(key);
    } catch (error) {
      if (error instanceof InvalidCredentialsError) {
        this.logger.debug(`API key ${hashKeyForLogging(key)} rejected`);
        return null;
      }
      throw error;
    }
  }

  private reject(
    route: RouteDefinition,
    clientKey: string,
    reason: RejectionReason,
    rateLimit: RateLimitResult,
  ): AccessOutcome {
    this.logger.debug(`Rejected ${route.path} for client ${hashKeyForLogging(clientKey)}: ${reason}`);
    return { decision: 'reject', reason, rateLimit };
  }
}
