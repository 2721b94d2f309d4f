import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
  ServiceUnavailableException,
  UnauthorizedException,
} from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';

import { RequestWithIdentity } from './request-identity';
import { RequestMediatorService } from './request-mediator.service';
import { RoutePolicyRegistry } from './route-policy.registry';
import {
  AccessCredentials,
  AccessOutcome,
  RateLimitResult,
  RejectionReason,
  RouteDefinition,
} from './types';

@Injectable()
export class AccessGuard implements CanActivate {
  private readonly logger = new Logger(AccessGuard.name);

  constructor(
    private readonly registry: RoutePolicyRegistry,
    private readonly mediator: RequestMediatorService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    if (context.getType() !== 'http') {
      return true;
    }

    const request = context.switchToHttp().getRequest<RequestWithIdentity>();
    const reply = context.switchToHttp().getResponse<FastifyReply>();
    const routePath = request.routeOptions.url ?? request.url;
    const route = this.registry.resolve(routePath);
    if (!route) {
      this.logger.warn(`No access policy registered for ${request.method} ${routePath}; refusing`);
      throw new ForbiddenException('Route is not accessible');
    }

    const outcome = await this.mediate(route, request);
    this.applyRateLimitHeaders(reply, outcome.rateLimit);

    if (outcome.decision === 'reject') {
      throw this.toHttpException(outcome.reason, outcome.rateLimit, reply);
    }

    request.identity = outcome.identity;
    return true;
  }

  private async mediate(route: RouteDefinition, request: RequestWithIdentity): Promise<AccessOutcome> {
    try {
      return await this.mediator.mediate(route, request.ip, this.extractCredentials(request));
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }

      this.logger.error(`Access validation failed for ${route.path}: ${this.errorReason(error)}`);
      throw new ServiceUnavailableException('Access validation failed');
    }
  }

  private toHttpException(
    reason: RejectionReason,
    rateLimit: RateLimitResult,
    reply: FastifyReply,
  ): HttpException {
    switch (reason) {
      case 'RateExceeded':
        reply.header('retry-after', String(rateLimit.retryAfter));
        return new HttpException('Rate limit exceeded', HttpStatus.TOO_MANY_REQUESTS);
      case 'InvalidCredentials':
        return new UnauthorizedException('Invalid credentials');
      case 'InsufficientPrivilege':
        return new ForbiddenException('Insufficient privilege');
    }
  }

  private extractCredentials(request: FastifyRequest): AccessCredentials {
    const credentials: AccessCredentials = {};

    const password = this.readQueryParam(request.query, 'password') ?? this.readHeader(request, 'x-route-password');
    if (password !== undefined) {
      credentials.password = password;
    }

    const bearerToken = this.extractBearer(this.readHeader(request, 'authorization') ?? '');
    if (bearerToken) {
      credentials.bearerToken = bearerToken;
    }

    const apiKey = this.readHeader(request, 'x-api-key');
    if (apiKey) {
      credentials.apiKey = apiKey;
    }

    return credentials;
  }

  private readHeader(request: FastifyRequest, name: string): string | undefined {
    const header = request.headers[name];
    return Array.isArray(header) ? header[0] : header;
  }

  private readQueryParam(query: unknown, name: string): string | undefined {
    if (typeof query !== 'object' || query === null || !(name in query)) {
      return undefined;
    }

    const value: unknown = Reflect.get(query, name);
    if (Array.isArray(value)) {
      return typeof value[0] === 'string' ? value[0] : undefined;
    }
    return typeof value === 'string' ? value : undefined;
  }

  private extractBearer(value: string): string | null {
    const [scheme, token] = value.split(' ');
    if (!scheme || !token || scheme.toLowerCase() !== 'bearer') {
      return null;
    }

    return token;
  }

  private applyRateLimitHeaders(reply: FastifyReply, rateLimit: RateLimitResult): void {
    reply.header('x-ratelimit-limit', String(rateLimit.limit));
    reply.header('x-ratelimit-remaining', String(rateLimit.remaining));
    reply.header('x-ratelimit-reset', String(rateLimit.resetAt));
  }

  private errorReason(error: unknown): string {
    if (error instanceof Error) {
      return error.name;
    }
    return 'UnknownError';
  }
}
