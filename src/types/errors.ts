/**
 * Error Taxonomy for the browser bridge
 *
 * - Error categories for high-level classification
 * - Error codes for programmatic handling
 * - Retryability indicators for the crawling engine's retry layer
 */

import type { BrowserTypeName } from './index.js';

/**
 * High-level error categories for classification
 */
export type ErrorCategory =
  | 'config'       // Conflicting or invalid configuration
  | 'browser'      // Target page/context/browser closed, crashes
  | 'navigation'   // Navigation failures and timeouts
  | 'download'     // File downloads that failed
  | 'content'      // Content retrieval races
  | 'internal';    // Anything else

/**
 * Machine-readable error codes
 */
export type ErrorCode =
  | 'CONFIG_CONFLICTING_ATTACH_MODES'
  | 'CONFIG_INVALID'
  | 'BROWSER_TARGET_CLOSED'
  | 'BROWSER_POOL_CLOSED'
  | 'NAVIGATION_TIMEOUT'
  | 'NAVIGATION_FAILED'
  | 'DOWNLOAD_FAILED'
  | 'CONTENT_PAGE_NAVIGATING'
  | 'UNKNOWN';

/**
 * Result of error classification
 */
export interface ErrorClassification {
  category: ErrorCategory;
  code: ErrorCode;
  retryable: boolean;
}

/**
 * Base class for errors raised by the bridge itself
 */
export class BridgeError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;

  constructor(code: ErrorCode, category: ErrorCategory, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.category = category;
    this.name = 'BridgeError';
  }
}

/**
 * A context was requested from a pool that has been closed
 */
export class PoolClosedError extends BridgeError {
  constructor(message: string) {
    super('BROWSER_POOL_CLOSED', 'browser', message);
    this.name = 'PoolClosedError';
  }
}

export class ConfigurationError extends BridgeError {
  constructor(message: string, code: ErrorCode = 'CONFIG_INVALID') {
    super(code, 'config', message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A navigation that did not settle within the configured navigation timeout.
 * The Playwright timeout error is kept as `cause`.
 */
export class NavigationTimeoutError extends BridgeError {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('NAVIGATION_TIMEOUT', 'navigation', `Navigation to ${url} timed out: ${detail}`, { cause });
    this.name = 'NavigationTimeoutError';
    this.url = url;
  }
}

export class DownloadFailedError extends BridgeError {
  readonly url: string;

  constructor(url: string, failure: string) {
    super('DOWNLOAD_FAILED', 'download', `Failed to download ${url}: ${failure}`);
    this.name = 'DownloadFailedError';
    this.url = url;
  }
}

function messageOf(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : '';
}

/**
 * Playwright reports a closed target through the error message only.
 */
export function isTargetClosedError(error: unknown): boolean {
  const message = messageOf(error);
  return (
    message.includes('Target page, context or browser has been closed') ||
    message.includes('Target closed') ||
    message.endsWith('Browser has been closed')
  );
}

/**
 * Raised by page.content() when a meta refresh or script navigation races the read.
 */
export function isNavigatingContentError(error: unknown): boolean {
  return messageOf(error).includes(
    'Unable to retrieve content because the page is navigating and changing the content'
  );
}

/**
 * The error page.goto() raises when the navigation turned into a file download.
 */
export function isDownloadNavigationError(error: unknown, browserType: BrowserTypeName): boolean {
  const message = messageOf(error);
  if (browserType === 'chromium') {
    return message.includes('net::ERR_ABORTED');
  }
  return message.includes('Download is starting');
}

/**
 * Map any error raised while fetching through the browser onto the taxonomy.
 */
export function classifyError(error: unknown): ErrorClassification {
  if (error instanceof BridgeError) {
    return {
      category: error.category,
      code: error.code,
      retryable: error.code === 'NAVIGATION_TIMEOUT' || error.code === 'BROWSER_TARGET_CLOSED',
    };
  }
  if (isTargetClosedError(error)) {
    return { category: 'browser', code: 'BROWSER_TARGET_CLOSED', retryable: true };
  }
  if (isNavigatingContentError(error)) {
    return { category: 'content', code: 'CONTENT_PAGE_NAVIGATING', retryable: true };
  }
  if (messageOf(error).startsWith('page.goto:') || messageOf(error).includes('net::ERR_')) {
    return { category: 'navigation', code: 'NAVIGATION_FAILED', retryable: false };
  }
  return { category: 'internal', code: 'UNKNOWN', retryable: false };
}
