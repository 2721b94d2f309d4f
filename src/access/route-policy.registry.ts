import { Inject, Injectable, Logger } from '@nestjs/common';
import Joi from 'joi';

import { RouteDefinition } from './types';

export const ROUTE_TABLE = Symbol('ROUTE_TABLE');

const rateBudgetSchema = Joi.object({
  maxRequests: Joi.number().integer().positive().required(),
  windowSeconds: Joi.number().integer().positive().required(),
});

const policySchema = Joi.object({
  kind: Joi.string().valid('none', 'password', 'token').required(),
  secret: Joi.when('kind', {
    is: 'password',
    then: Joi.string().allow('').required(),
    otherwise: Joi.forbidden(),
  }),
  minPrivilege: Joi.when('kind', {
    is: 'token',
    then: Joi.number().integer().min(0).required(),
    otherwise: Joi.forbidden(),
  }),
});

const routeTableSchema = Joi.array()
  .items(
    Joi.object({
      path: Joi.string().pattern(/^\//).required(),
      policy: policySchema.required(),
      rateLimit: rateBudgetSchema.optional(),
    }),
  )
  .unique('path');

/**
 * Immutable lookup table of route policies, validated once at startup.
 */
@Injectable()
export class RoutePolicyRegistry {
  private readonly logger = new Logger(RoutePolicyRegistry.name);
  private readonly routes: ReadonlyMap<string, Readonly<RouteDefinition>>;

  constructor(@Inject(ROUTE_TABLE) table: RouteDefinition[]) {
    const { error } = routeTableSchema.validate(table, { abortEarly: false });
    if (error) {
      throw new Error(`Invalid route table: ${error.message}`);
    }

    const routes = new Map<string, Readonly<RouteDefinition>>();
    for (const route of table) {
      routes.set(route.path, this.freeze(route));
      if (route.policy.kind === 'password' && route.policy.secret.length === 0) {
        this.logger.warn(`Route ${route.path} has no password configured; every request will be refused`);
      }
    }
    this.routes = routes;
  }

  resolve(path: string): Readonly<RouteDefinition> | undefined {
    return this.routes.get(path);
  }

  list(): Readonly<RouteDefinition>[] {
    return [...this.routes.values()];
  }

  private freeze(route: RouteDefinition): Readonly<RouteDefinition> {
    return Object.freeze({
      path: route.path,
      policy: Object.freeze({ ...route.policy }),
      ...(route.rateLimit ? { rateLimit: Object.freeze({ ...route.rateLimit }) } : {}),
    });
  }
}
