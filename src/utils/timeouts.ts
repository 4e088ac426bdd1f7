/**
 * Central Timeout Configuration
 *
 * All timeout values should be imported from this module to ensure
 * consistent behavior across the codebase.
 */

/**
 * Default timeout values in milliseconds
 */
export const TIMEOUTS = {
  /**
   * Playwright's own navigation default, used to bound waits that follow a
   * navigation when no navigation timeout is configured
   */
  NAVIGATION_DEFAULT: 30000,

  /**
   * Timeout for the fallback HTTP fetcher
   */
  NETWORK_FETCH: 30000,
} as const;

/**
 * Type for timeout keys
 */
export type TimeoutKey = keyof typeof TIMEOUTS;

/**
 * Get a timeout value with optional override
 *
 * @param key - The timeout key
 * @param override - Optional override value (if provided, takes precedence)
 */
export function getTimeout(key: TimeoutKey, override?: number | null): number {
  return override ?? TIMEOUTS[key];
}
