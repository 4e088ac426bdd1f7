/**
 * Tests for the error taxonomy
 *
 * Validates the Playwright error predicates and the classification used
 * to decide retryability.
 */

import { describe, it, expect } from 'vitest';
import {
  BridgeError,
  ConfigurationError,
  DownloadFailedError,
  NavigationTimeoutError,
  PoolClosedError,
  classifyError,
  isDownloadNavigationError,
  isNavigatingContentError,
  isTargetClosedError,
} from '../../src/types/errors.js';

describe('errors', () => {
  describe('isTargetClosedError', () => {
    it('should match the closed target message', () => {
      expect(isTargetClosedError(new Error('page.goto: Target page, context or browser has been closed'))).toBe(true);
    });

    it('should match protocol level target closed errors', () => {
      expect(isTargetClosedError(new Error('Protocol error (Page.navigate): Target closed.'))).toBe(true);
    });

    it('should match a closed browser', () => {
      expect(isTargetClosedError(new Error('browser.newContext: Browser has been closed'))).toBe(true);
    });

    it('should accept plain strings', () => {
      expect(isTargetClosedError('Target closed')).toBe(true);
    });

    it('should not match other errors', () => {
      expect(isTargetClosedError(new Error('page.goto: net::ERR_NAME_NOT_RESOLVED'))).toBe(false);
      expect(isTargetClosedError(undefined)).toBe(false);
      expect(isTargetClosedError({ message: 'Target closed' })).toBe(false);
    });
  });

  describe('isNavigatingContentError', () => {
    it('should match the content race', () => {
      expect(
        isNavigatingContentError(
          new Error('page.content: Unable to retrieve content because the page is navigating and changing the content.')
        )
      ).toBe(true);
    });

    it('should not match other content errors', () => {
      expect(isNavigatingContentError(new Error('page.content: Target closed'))).toBe(false);
    });
  });

  describe('isDownloadNavigationError', () => {
    it('should expect net::ERR_ABORTED from chromium', () => {
      const error = new Error('page.goto: net::ERR_ABORTED at https://example.com/file.pdf');
      expect(isDownloadNavigationError(error, 'chromium')).toBe(true);
      expect(isDownloadNavigationError(error, 'firefox')).toBe(false);
    });

    it('should expect "Download is starting" from other engines', () => {
      const error = new Error('page.goto: Download is starting');
      expect(isDownloadNavigationError(error, 'firefox')).toBe(true);
      expect(isDownloadNavigationError(error, 'webkit')).toBe(true);
      expect(isDownloadNavigationError(error, 'chromium')).toBe(false);
    });
  });

  describe('BridgeError subclasses', () => {
    it('should carry code and category', () => {
      const error = new PoolClosedError('closed');
      expect(error).toBeInstanceOf(BridgeError);
      expect(error.code).toBe('BROWSER_POOL_CLOSED');
      expect(error.category).toBe('browser');
      expect(error.name).toBe('PoolClosedError');
    });

    it('should default configuration errors to CONFIG_INVALID', () => {
      expect(new ConfigurationError('bad').code).toBe('CONFIG_INVALID');
      expect(new ConfigurationError('bad', 'CONFIG_CONFLICTING_ATTACH_MODES').code).toBe(
        'CONFIG_CONFLICTING_ATTACH_MODES'
      );
    });

    it('should keep the timeout as cause', () => {
      const cause = new Error('page.goto: Timeout 100ms exceeded.');
      const error = new NavigationTimeoutError('https://example.com', cause);
      expect(error.message).toBe('Navigation to https://example.com timed out: page.goto: Timeout 100ms exceeded.');
      expect(error.cause).toBe(cause);
      expect(error.url).toBe('https://example.com');
    });

    it('should describe failed downloads', () => {
      const error = new DownloadFailedError('https://example.com/a.zip', 'canceled');
      expect(error.message).toBe('Failed to download https://example.com/a.zip: canceled');
      expect(error.category).toBe('download');
    });
  });

  describe('classifyError', () => {
    it('should classify bridge errors by their code', () => {
      expect(classifyError(new NavigationTimeoutError('https://example.com', 'slow'))).toEqual({
        category: 'navigation',
        code: 'NAVIGATION_TIMEOUT',
        retryable: true,
      });
      expect(classifyError(new DownloadFailedError('https://example.com', 'canceled'))).toEqual({
        category: 'download',
        code: 'DOWNLOAD_FAILED',
        retryable: false,
      });
    });

    it('should classify closed targets as retryable', () => {
      expect(classifyError(new Error('Target page, context or browser has been closed'))).toEqual({
        category: 'browser',
        code: 'BROWSER_TARGET_CLOSED',
        retryable: true,
      });
    });

    it('should classify content races as retryable', () => {
      expect(
        classifyError(
          new Error('Unable to retrieve content because the page is navigating and changing the content')
        ).code
      ).toBe('CONTENT_PAGE_NAVIGATING');
    });

    it('should classify navigation failures', () => {
      expect(classifyError(new Error('page.goto: net::ERR_NAME_NOT_RESOLVED at https://nowhere.test'))).toEqual({
        category: 'navigation',
        code: 'NAVIGATION_FAILED',
        retryable: false,
      });
    });

    it('should fall back to unknown', () => {
      expect(classifyError(new Error('something else'))).toEqual({
        category: 'internal',
        code: 'UNKNOWN',
        retryable: false,
      });
    });
  });
});
