/**
 * BrowserFetcher
 *
 * Entry point for the crawling engine. Requests flagged for the browser are
 * served by a page from the context pool; everything else goes to the
 * fallback fetcher.
 *
 * Per browser request:
 * 1. Reuse the page handed back earlier, or acquire the context and open a page
 * 2. Attach the request's page event handlers
 * 3. Arm the request interceptor
 * 4. Navigate, run scripted steps, read the content or the download
 * 5. Build the response; close the page unless the caller keeps it
 *
 * The whole flow is retried when the page, context or browser is closed
 * underneath it.
 */

import type { BrowserType, Page } from 'playwright-core';
import type { Fetcher, FetchRequest, PageEventListener } from '../types/index.js';
import { isTargetClosedError } from '../types/errors.js';
import { HeaderMap } from '../utils/headers.js';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { MemoryStatsCollector, statKey, type StatsCollector } from '../utils/stats.js';
import { ContextPool } from './context-pool.js';
import { HttpFetcher } from './http-fetcher.js';
import { NavigationCoordinator } from './navigation-coordinator.js';
import { PageAllocator } from './page-allocator.js';
import { RequestInterceptor } from './request-interceptor.js';
import { DEFAULT_CONTEXT_NAME, ResourceConfig } from './resource-config.js';
import { ResponseBuilder, type BrowserResponse } from './response-builder.js';

const log = logger.fetcher;

/**
 * Page events attached by name. Playwright types each event separately;
 * handlers from the options bag are keyed by arbitrary strings.
 */
interface PageEventTarget {
  on(event: string, listener: PageEventListener): unknown;
}

export interface BrowserFetcherOptions {
  config?: ResourceConfig;
  stats?: StatsCollector;
  /** Serves requests without the browser flag */
  fallback?: Fetcher;
  /** Object whose methods can be named as page event handlers */
  handlerHost?: object;
  /** Engine override; defaults to the configured browser type */
  browserType?: BrowserType;
}

export class BrowserFetcher implements Fetcher {
  readonly config: ResourceConfig;
  readonly stats: StatsCollector;
  readonly pool: ContextPool;
  private readonly pages: PageAllocator;
  private readonly navigation: NavigationCoordinator;
  private readonly builder = new ResponseBuilder();
  private readonly fallback: Fetcher;
  private readonly handlerHost?: object;

  constructor(options: BrowserFetcherOptions = {}) {
    this.config = options.config ?? ResourceConfig.fromOptions();
    this.stats = options.stats ?? new MemoryStatsCollector();
    this.fallback = options.fallback ?? new HttpFetcher();
    this.handlerHost = options.handlerHost;
    this.pool = new ContextPool({ config: this.config, stats: this.stats, browserType: options.browserType });
    this.pages = new PageAllocator(this.pool, this.config, this.stats);
    this.navigation = new NavigationCoordinator(this.config, this.stats);
  }

  /**
   * Launch the configured startup contexts
   */
  async start(): Promise<void> {
    log.info('Starting browser fetcher', { browserType: this.config.browserType, attachMode: this.config.attachMode });
    await this.pool.launchStartupContexts();
  }

  async fetch(request: FetchRequest): Promise<BrowserResponse> {
    if (!request.options.browser) {
      return this.fallback.fetch(request);
    }

    return withRetry(() => this.fetchWithPage(request), {
      maxAttempts: this.config.targetClosedMaxRetries + 1,
      retryOn: isTargetClosedError,
      operation: 'browser fetch',
      onRetry: (attempt, error) => {
        log.debug('Target closed, retrying to create page', {
          url: request.url,
          method: request.method,
          attempt,
          errorMessage: error.message,
        });
      },
    });
  }

  async close(): Promise<void> {
    log.info('Closing browser fetcher');
    await this.pool.close();
  }

  private async fetchWithPage(request: FetchRequest): Promise<BrowserResponse> {
    const contextName = request.options.context ?? DEFAULT_CONTEXT_NAME;
    request.meta.context = contextName;

    let page = request.meta.page ?? request.options.page;
    if (!page || page.isClosed()) {
      const wrapper = await this.pool.acquire(contextName, request.options.contextOptions);
      page = await this.pages.newPage(wrapper, request);
      await this.runPageInitCallback(page, request, contextName);
    }

    this.attachEventHandlers(page, request, contextName);

    const interceptor = new RequestInterceptor({
      config: this.config,
      stats: this.stats,
      contextName,
      request,
    });
    await interceptor.install(page);

    try {
      return await this.fetchOnPage(page, request);
    } catch (error) {
      if (!request.options.includePage && !page.isClosed()) {
        log.warn('Closing page due to failed request', {
          contextName,
          url: request.url,
          method: request.method,
          error,
        });
        await page.close();
        this.stats.incValue(statKey('page_count', 'closed'));
      }
      throw error;
    }
  }

  private async fetchOnPage(page: Page, request: FetchRequest): Promise<BrowserResponse> {
    // available to error handlers even if something below fails
    if (request.options.includePage) {
      request.meta.page = page;
    }

    const startTime = Date.now();
    const outcome = await this.navigation.navigate(page, request);

    let response: BrowserResponse;
    if (outcome.kind === 'download') {
      request.meta.downloadLatencyMs = Date.now() - startTime;
      response = this.builder.fromDownload(request, outcome.download);
    } else {
      let headers = new HeaderMap();
      let status = 200;
      if (outcome.kind === 'navigated') {
        const redirects = await this.navigation.collectRedirects(outcome.response);
        if (redirects.times > 0) {
          request.meta.redirectTimes = redirects.times;
          request.meta.redirectUrls = redirects.urls;
          request.meta.redirectReasons = redirects.reasons;
        }
        headers = new HeaderMap(await outcome.response.allHeaders());
        status = outcome.response.status();
      } else {
        log.warn('Navigation returned no response, the response will have empty headers and status 200', {
          contextName: request.meta.context,
          url: request.url,
          method: request.method,
        });
      }

      await this.navigation.applyPageMethods(page, request);
      const content = await this.navigation.getContent(page);
      request.meta.downloadLatencyMs = Date.now() - startTime;

      let ipAddress: string | undefined;
      if (outcome.kind === 'navigated') {
        const server = await this.navigation.readServerMetadata(outcome.response);
        request.meta.securityDetails = server.securityDetails;
        ipAddress = server.ipAddress;
      }

      response = this.builder.fromPage(request, { url: page.url(), status, headers, content, ipAddress });
    }

    if (!request.options.includePage) {
      await page.close();
      this.stats.incValue(statKey('page_count', 'closed'));
    }
    return response;
  }

  private async runPageInitCallback(page: Page, request: FetchRequest, contextName: string): Promise<void> {
    const callback = request.options.pageInitCallback;
    if (!callback) {
      return;
    }
    try {
      await callback(page, request);
    } catch (error) {
      log.warn('Page init callback failed', { contextName, url: request.url, method: request.method, error });
    }
  }

  private attachEventHandlers(page: Page, request: FetchRequest, contextName: string): void {
    const target: PageEventTarget = page;
    const host = this.handlerHost;

    for (const [event, handler] of Object.entries(request.options.pageEventHandlers ?? {})) {
      if (typeof handler === 'function') {
        target.on(event, handler);
        continue;
      }

      const method: unknown = host ? Reflect.get(host, handler) : undefined;
      if (typeof method === 'function') {
        target.on(event, (...args: unknown[]) => Reflect.apply(method, host, args));
      } else {
        log.warn('Handler host has no such method, ignoring handler for event', {
          contextName,
          url: request.url,
          event,
          handler,
        });
      }
    }
  }
}
