/**
 * Structured Logger using Pino
 *
 * Provides structured JSON logging with:
 * - Multiple log levels (debug, info, warn, error)
 * - Component-based child loggers
 * - Structured metadata for each log entry
 * - Output to stderr so the crawling engine keeps stdout for itself
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { getLogConfig, isConfigValid } from './env-parser.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Log context metadata
 */
export interface LogContext {
  component?: string;
  contextName?: string;
  url?: string;
  method?: string;
  browserRequestUrl?: string;
  browserRequestMethod?: string;
  durationMs?: number;
  [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
  destination: 'stderr' | 'stdout';
}

/**
 * LOG_LEVEL / LOG_PRETTY, or the defaults when they do not validate
 */
function configFromEnv(): LoggerConfig {
  const fromEnv = isConfigValid('log').valid
    ? getLogConfig()
    : { level: 'info' as const, prettyPrint: false };
  return { ...fromEnv, destination: 'stderr' };
}

const DEFAULT_CONFIG: LoggerConfig = configFromEnv();

/**
 * Paths to redact from logs. Request interception logs whole header bags,
 * and connect options may carry credentials.
 *
 * See: https://getpino.io/#/docs/redaction
 */
const REDACT_PATHS = [
  'headers.authorization',
  'headers.cookie',
  'headers["proxy-authorization"]',
  'headers["set-cookie"]',
  'finalHeaders.authorization',
  'finalHeaders.cookie',
  'finalHeaders["proxy-authorization"]',
  'responseHeaders["set-cookie"]',
  '*.password',
  '*.secret',
  '*.token',
  '*.credentials',
  'connectOptions.headers',
  'cdpOptions.headers',
];

/**
 * Create the base Pino logger instance
 */
function createBaseLogger(config: LoggerConfig = DEFAULT_CONFIG): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      pid: process.pid,
      service: 'browser-fetch-bridge',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: config.destination === 'stderr' ? 2 : 1,
        },
      },
    });
  }

  const destination = config.destination === 'stderr' ? process.stderr : process.stdout;
  return pino(options, destination);
}

let baseLogger = createBaseLogger();

/**
 * Reconfigure the logger (useful for testing or runtime changes)
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  baseLogger = createBaseLogger({ ...DEFAULT_CONFIG, ...config });
}

/**
 * Component-specific logger wrapper
 *
 * Uses a getter to always access the current baseLogger, allowing
 * reconfiguration at runtime via configureLogger().
 */
export class Logger {
  private _logger: PinoLogger | null = null;
  private component: string;

  constructor(component: string, parentLogger?: PinoLogger) {
    this.component = component;
    if (parentLogger) {
      this._logger = parentLogger.child({ component });
    }
  }

  private get logger(): PinoLogger {
    if (this._logger) {
      return this._logger;
    }
    return baseLogger.child({ component: this.component });
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.component);
    childLogger._logger = this.logger.child(context);
    return childLogger;
  }

  debug(message: string, context?: LogContext & { error?: unknown }): void {
    this.logger.debug(serializeContext(context), message);
  }

  info(message: string, context?: LogContext & { error?: unknown }): void {
    this.logger.info(serializeContext(context), message);
  }

  /**
   * Warn level. An `error` entry is serialized the same way at every level.
   */
  warn(message: string, context?: LogContext & { error?: unknown }): void {
    this.logger.warn(serializeContext(context), message);
  }

  /**
   * Error level - error conditions
   * Accepts unknown type for error since catch blocks provide unknown
   */
  error(message: string, context?: LogContext & { error?: unknown }): void {
    this.logger.error(serializeContext(context), message);
  }

  /**
   * Log with timing information
   */
  timed(message: string, startTime: number, context?: LogContext): void {
    const durationMs = Date.now() - startTime;
    this.debug(message, { ...context, durationMs });
  }
}

function serializeContext(context?: LogContext & { error?: unknown }): LogContext {
  if (!context?.error) {
    return context || {};
  }
  const { error, ...rest } = context;
  const err = error instanceof Error
    ? { message: error.message, name: error.name, stack: error.stack }
    : { message: String(error) };
  return { ...rest, err };
}

/**
 * Pre-configured loggers for each component
 */
export const logger = {
  pool: new Logger('ContextPool'),
  pages: new Logger('PageAllocator'),
  interceptor: new Logger('RequestInterceptor'),
  navigation: new Logger('NavigationCoordinator'),
  fetcher: new Logger('BrowserFetcher'),
  http: new Logger('HttpFetcher'),
  config: new Logger('Config'),
  retry: new Logger('Retry'),

  // Create a custom logger for any component
  create: (component: string) => new Logger(component),
};

export default logger;
