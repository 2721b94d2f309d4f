import { UnauthorizedException } from '@nestjs/common';
import type { FastifyRequest } from 'fastify';

import { Identity } from '../credentials/types';

export type RequestWithIdentity = FastifyRequest & {
  identity?: Identity | null;
};

// For handlers behind a token policy; the guard has already resolved the caller.
export function requireIdentity(request: RequestWithIdentity): Identity {
  if (!request.identity) {
    throw new UnauthorizedException('Invalid credentials');
  }
  return request.identity;
}
