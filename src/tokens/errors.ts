export type TokenErrorKind = 'expired' | 'bad-signature' | 'revoked';

/**
 * Carries the validation detail for logs and tests. Callers facing a client
 * answer every kind with the same opaque authentication failure.
 */
export class TokenError extends Error {
  constructor(readonly kind: TokenErrorKind) {
    super(`Token rejected: ${kind}`);
    this.name = 'TokenError';
  }
}
