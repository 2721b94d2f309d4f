import {
  ConflictException,
  HttpException,
  Logger,
  ServiceUnavailableException,
  UnauthorizedException,
} from '@nestjs/common';

import { DuplicateEmailError, InvalidCredentialsError } from '../credentials/errors';
import { TokenError } from '../tokens/errors';

/**
 * Maps domain failures to HTTP answers. Every authentication failure gets
 * the same 401 body; anything unrecognised is reported as a store outage.
 */
export function toHttpException(error: unknown, logger: Logger): HttpException {
  if (error instanceof HttpException) {
    return error;
  }
  if (error instanceof DuplicateEmailError) {
    return new ConflictException(error.message);
  }
  if (error instanceof InvalidCredentialsError || error instanceof TokenError) {
    return new UnauthorizedException('Invalid credentials');
  }

  logger.error(`Unexpected failure: ${error instanceof Error ? error.name : 'UnknownError'}`);
  return new ServiceUnavailableException('Credential store unavailable');
}
