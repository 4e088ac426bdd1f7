/**
 * NavigationCoordinator
 *
 * Drives one page through a caller request:
 *
 *   Idle -> Navigating -> Navigated     (goto returned a response)
 *                      -> NoResponse    (goto returned null)
 *                      -> DownloadTriggered -> DownloadComplete
 *
 * A navigation that turns into a file download makes goto fail with an
 * engine specific error. The coordinator then waits for the download to
 * start; an intermediate 204 means no file was offered and the navigation
 * error is re-raised, anything else waits for the download to be read.
 */

import { isIP } from 'node:net';
import { buffer } from 'node:stream/consumers';
import {
  errors,
  type Download,
  type Page,
  type Response as BrowserNetworkResponse,
} from 'playwright-core';
import type { BrowserRequestOptions, FetchRequest, SecurityDetails } from '../types/index.js';
import {
  DownloadFailedError,
  isDownloadNavigationError,
  isNavigatingContentError,
  NavigationTimeoutError,
} from '../types/errors.js';
import { AsyncEvent } from '../utils/async-primitives.js';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { statKey, type StatsCollector } from '../utils/stats.js';
import { getTimeout } from '../utils/timeouts.js';
import { PageMethod } from './page-methods.js';
import type { ResourceConfig } from './resource-config.js';

const log = logger.navigation;

type GotoRequestOptions = NonNullable<BrowserRequestOptions['gotoOptions']>;

/**
 * Everything learned about a download while it is in progress
 */
export class DownloadRecord {
  body: Buffer = Buffer.alloc(0);
  url = '';
  suggestedFilename = '';
  /** Raised once the flow reaches the download-complete state */
  exception: Error | null = null;
  /** Status of the last response the page saw */
  responseStatus = 200;
  headers: Record<string, string> = {};

  /**
   * True once the download delivered a body or failed
   */
  get received(): boolean {
    return this.body.length > 0 || this.exception !== null;
  }
}

export type NavigationOutcome =
  | { kind: 'navigated'; response: BrowserNetworkResponse }
  | { kind: 'no-response' }
  | { kind: 'download'; download: DownloadRecord };

export interface RedirectHistory {
  times: number;
  /** Oldest first */
  urls: string[];
  /** Status of each redirecting response; null when it is not available */
  reasons: Array<number | null>;
}

export interface ServerMetadata {
  ipAddress?: string;
  securityDetails: SecurityDetails;
}

export class NavigationCoordinator {
  constructor(
    private readonly config: ResourceConfig,
    private readonly stats: StatsCollector
  ) {}

  async navigate(page: Page, request: FetchRequest): Promise<NavigationOutcome> {
    const logContext = { contextName: request.meta.context, url: request.url, method: request.method };
    const download = new DownloadRecord();
    const downloadStarted = new AsyncEvent();
    const downloadReady = new AsyncEvent();

    const onDownload = (pending: Download): void => {
      this.captureDownload(pending, download, downloadStarted, downloadReady).catch((error: unknown) => {
        log.error('Download handler failed', { ...logContext, error });
      });
    };
    const onResponse = (response: BrowserNetworkResponse): void => {
      recordDownloadResponse(response, download, downloadStarted).catch((error: unknown) => {
        log.debug('Could not read response headers', { ...logContext, error });
      });
    };

    const { url: ignoredUrl, ...gotoOptions }: GotoRequestOptions = request.options.gotoOptions ?? {};
    if (ignoredUrl !== undefined) {
      log.debug('Ignoring url in goto options', { ...logContext, ignoredUrl });
    }

    page.on('download', onDownload);
    page.on('response', onResponse);
    try {
      const response = await page.goto(request.url, gotoOptions);
      return response ? { kind: 'navigated', response } : { kind: 'no-response' };
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new NavigationTimeoutError(request.url, error);
      }
      if (!isDownloadNavigationError(error, this.config.browserType)) {
        throw error;
      }

      log.debug('Navigation failed, waiting for a download', logContext);
      const started = await this.waitForDownloadStart(downloadStarted);
      if (!started || download.responseStatus === 204) {
        throw error;
      }

      log.debug('Waiting on download to finish', logContext);
      await downloadReady.wait();
      if (download.exception) {
        throw download.exception;
      }
      if (!download.received) {
        log.warn('Download finished without a body', logContext);
        return { kind: 'no-response' };
      }
      return { kind: 'download', download };
    } finally {
      page.off('download', onDownload);
      page.off('response', onResponse);
    }
  }

  /**
   * Walk the redirect chain back from the final response
   */
  async collectRedirects(response: BrowserNetworkResponse): Promise<RedirectHistory> {
    const urls: string[] = [];
    const reasons: Array<number | null> = [];

    let redirected = response.request().redirectedFrom();
    while (redirected) {
      urls.push(redirected.url());
      const redirectResponse = await redirected.response();
      reasons.push(redirectResponse ? redirectResponse.status() : null);
      redirected = redirected.redirectedFrom();
    }

    return { times: urls.length, urls: urls.reverse(), reasons: reasons.reverse() };
  }

  /**
   * Run the request's scripted steps in order, letting the page settle after each
   */
  async applyPageMethods(page: Page, request: FetchRequest): Promise<void> {
    const steps: unknown[] = Object.values(request.options.pageMethods ?? {});
    const logContext = { contextName: request.meta.context, url: request.url, method: request.method };

    for (const step of steps) {
      if (!(step instanceof PageMethod)) {
        log.warn('Ignoring page method: expected a PageMethod', { ...logContext, received: describe(step) });
        continue;
      }
      if (!step.isResolvable()) {
        log.warn('Ignoring page method: could not find method', { ...logContext, pageMethod: step.toString() });
        continue;
      }

      await step.run(page);
      await page.waitForLoadState(
        undefined,
        this.config.navigationTimeout === null ? undefined : { timeout: this.config.navigationTimeout }
      );
    }
  }

  /**
   * page.content(), retried when a navigation races the read
   */
  getContent(page: Page): Promise<string> {
    return withRetry(() => page.content(), {
      maxAttempts: this.config.contentRetrievalRetries + 1,
      retryOn: isNavigatingContentError,
      operation: 'page.content',
    });
  }

  async readServerMetadata(response: BrowserNetworkResponse): Promise<ServerMetadata> {
    const securityDetails = await response.securityDetails();
    const serverAddr = await response.serverAddr();
    const ipAddress = serverAddr && isIP(serverAddr.ipAddress) ? serverAddr.ipAddress : undefined;
    return { ipAddress, securityDetails };
  }

  private async captureDownload(
    pending: Download,
    record: DownloadRecord,
    started: AsyncEvent,
    ready: AsyncEvent
  ): Promise<void> {
    started.set();
    this.stats.incValue(statKey('download_count'));
    try {
      const failure = await pending.failure();
      if (failure) {
        throw new DownloadFailedError(pending.url(), failure);
      }
      record.body = await buffer(await pending.createReadStream());
      record.url = pending.url();
      record.suggestedFilename = pending.suggestedFilename();
    } catch (error) {
      record.exception = error instanceof Error ? error : new Error(String(error));
    } finally {
      ready.set();
    }
  }

  /**
   * Bounded by the navigation timeout, Playwright's default when unset.
   * A timeout of 0 waits indefinitely, as it does for goto.
   */
  private async waitForDownloadStart(started: AsyncEvent): Promise<boolean> {
    const timeout = getTimeout('NAVIGATION_DEFAULT', this.config.navigationTimeout);
    if (timeout === 0) {
      await started.wait();
      return true;
    }
    return started.waitFor(timeout);
  }
}

async function recordDownloadResponse(
  response: BrowserNetworkResponse,
  record: DownloadRecord,
  started: AsyncEvent
): Promise<void> {
  record.responseStatus = response.status();
  try {
    record.headers = await response.allHeaders();
  } finally {
    started.set();
  }
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}
