export const RATE_BUDGET_STORE = Symbol('RATE_BUDGET_STORE');

export type RateWindow = {
  count: number;
  resetAtMs: number;
};

/**
 * Counts one request against `scope`/`clientKey` and returns the window it
 * landed in. Opening a window, resetting an expired one and incrementing
 * must happen as one atomic step per key.
 */
export interface RateBudgetStore {
  hit(scope: string, clientKey: string, windowMs: number): Promise<RateWindow>;
}
