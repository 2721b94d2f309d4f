import { Privilege } from '../credentials/types';
import { RateBudgetConfig, RouteDefinition } from './types';

export type RouteTableConfig = {
  demoRoutePassword: string;
  authBudget: RateBudgetConfig;
};

/**
 * Every route the application serves, with the policy the access guard
 * applies to it. Paths are the router patterns, parameters included.
 */
export function buildRouteTable(config: RouteTableConfig): RouteDefinition[] {
  const user = { kind: 'token', minPrivilege: Privilege.User } as const;
  const admin = { kind: 'token', minPrivilege: Privilege.Admin } as const;

  return [
    { path: '/health', policy: { kind: 'none' } },
    { path: '/health/store', policy: { kind: 'none' } },

    { path: '/auth/register', policy: { kind: 'none' }, rateLimit: config.authBudget },
    { path: '/auth/login', policy: { kind: 'none' }, rateLimit: config.authBudget },
    { path: '/auth/refresh', policy: { kind: 'none' }, rateLimit: config.authBudget },
    { path: '/auth/logout', policy: { kind: 'none' } },
    { path: '/auth/api-key', policy: user },

    { path: '/users/me', policy: user },
    { path: '/admin/users', policy: admin },
    { path: '/admin/users/:userId/privilege', policy: admin },
    { path: '/admin/users/:userId/disable', policy: admin },

    { path: '/guest-demo', policy: { kind: 'none' } },
    { path: '/admin-demo', policy: admin },
    { path: '/protected', policy: { kind: 'password', secret: config.demoRoutePassword } },
  ];
}
