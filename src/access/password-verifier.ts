import { digestEquals } from '../utils/hash';

/**
 * Compares a route password with the configured secret in constant time.
 * An empty configured secret matches nothing. Case-sensitive.
 */
export function checkPassword(routeSecret: string, provided: string | undefined): boolean {
  if (routeSecret.length === 0 || provided === undefined) {
    return false;
  }

  return digestEquals(routeSecret, provided);
}
