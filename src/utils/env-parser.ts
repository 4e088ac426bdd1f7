/**
 * Environment Variable Parser
 *
 * Type-safe environment variable parsing with validation.
 * Centralizes all env var access and provides clear error messages
 * for misconfiguration.
 */

import {
  logConfigSchema,
  bridgeEnvSchema,
  ConfigValidationError,
  type LogConfig,
  type BridgeEnvSettings,
} from './config-schemas.js';

export const ENV_PREFIX = 'BROWSER_BRIDGE_';

type Env = Record<string, string | undefined>;

// ============================================
// ENVIRONMENT VARIABLE MAPPING
// ============================================

function mapEnvToLogConfig(env: Env) {
  return {
    level: env.LOG_LEVEL,
    prettyPrint: env.LOG_PRETTY,
  };
}

function mapEnvToBridgeSettings(env: Env) {
  const read = (name: string) => env[`${ENV_PREFIX}${name}`];
  return {
    browserType: read('BROWSER_TYPE'),
    cdpUrl: read('CDP_URL'),
    connectUrl: read('CONNECT_URL'),
    concurrentRequests: read('CONCURRENT_REQUESTS'),
    maxPagesPerContext: read('MAX_PAGES_PER_CONTEXT'),
    maxContexts: read('MAX_CONTEXTS'),
    navigationTimeout: read('NAVIGATION_TIMEOUT'),
    restartDisconnectedBrowser: read('RESTART_DISCONNECTED_BROWSER'),
    targetClosedMaxRetries: read('TARGET_CLOSED_MAX_RETRIES'),
    contentRetrievalRetries: read('CONTENT_RETRIES'),
    headless: read('HEADLESS'),
  };
}

// ============================================
// CONFIG PARSERS
// ============================================

/**
 * Parse and validate logging configuration from environment.
 */
export function parseLogConfig(env: Env = process.env): LogConfig {
  const result = logConfigSchema.safeParse(mapEnvToLogConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('logging', result.error);
  }
  return result.data;
}

/**
 * Parse and validate the bridge settings from environment.
 * Only the variables that are set appear in the result.
 */
export function parseBridgeEnv(env: Env = process.env): BridgeEnvSettings {
  const result = bridgeEnvSchema.safeParse(mapEnvToBridgeSettings(env));
  if (!result.success) {
    throw new ConfigValidationError('browserBridge', result.error);
  }
  return dropUndefined(result.data);
}

function dropUndefined<T extends object>(value: T): T {
  const copy = { ...value };
  for (const key of Object.keys(copy)) {
    if (Reflect.get(copy, key) === undefined) {
      Reflect.deleteProperty(copy, key);
    }
  }
  return copy;
}

// ============================================
// CONFIG CACHING
// ============================================

let cachedLogConfig: LogConfig | null = null;

/**
 * Get cached log configuration (parses once on first call).
 */
export function getLogConfig(): LogConfig {
  if (!cachedLogConfig) {
    cachedLogConfig = parseLogConfig();
  }
  return cachedLogConfig;
}

/**
 * Clear all cached configurations.
 * Useful for testing when environment variables change.
 */
export function clearConfigCache(): void {
  cachedLogConfig = null;
}

/**
 * Check if a configuration section is valid without throwing.
 *
 * @returns Object with success boolean and optional error message.
 */
export function isConfigValid(
  section: 'log' | 'browserBridge',
  env: Env = process.env
): { valid: boolean; error?: string } {
  try {
    if (section === 'log') {
      parseLogConfig(env);
    } else {
      parseBridgeEnv(env);
    }
    return { valid: true };
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return { valid: false, error: error.message };
    }
    return { valid: false, error: String(error) };
  }
}
