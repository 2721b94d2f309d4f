const ENABLED = ['true', 'yes', 'y', 'on'];
const DISABLED = ['', 'false', '0', 'no', 'n', 'off'];

/**
 * Turns TRUST_PROXY into Fastify's `trustProxy` option: a flag, a hop count,
 * or a comma-separated list of trusted proxy addresses/CIDRs.
 */
export function resolveTrustProxy(value: unknown): boolean | number | string {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value !== 'string') {
    return false;
  }

  const normalized = value.trim().toLowerCase();
  if (DISABLED.includes(normalized)) {
    return false;
  }
  if (ENABLED.includes(normalized)) {
    return true;
  }
  if (/^\d+$/.test(normalized)) {
    return Number(normalized);
  }

  return normalized
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .join(',');
}
