/**
 * Utilities barrel export
 */

export * from './async-primitives.js';
export * from './encoding.js';
export * from './headers.js';
export * from './retry.js';
export * from './stats.js';
export { ConfigValidationError, formatConfigErrors } from './config-schemas.js';
export { parseBridgeEnv, ENV_PREFIX } from './env-parser.js';
export { configureLogger, Logger, type LogLevel, type LoggerConfig } from './logger.js';
