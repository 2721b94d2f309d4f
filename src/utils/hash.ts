import { createHash, timingSafeEqual } from 'node:crypto';

export function sha256Hex(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

/**
 * Constant-time string equality. Comparing fixed-size digests keeps the
 * running time independent of both the inputs' lengths and where they differ.
 */
export function digestEquals(left: string, right: string): boolean {
  const leftDigest = createHash('sha256').update(left).digest();
  const rightDigest = createHash('sha256').update(right).digest();
  return timingSafeEqual(leftDigest, rightDigest);
}

// Short stable digest for log lines; keys, tokens and client addresses never appear in full.
export function hashKeyForLogging(key: string): string {
  return sha256Hex(key).substring(0, 32);
}
