/**
 * RequestInterceptor
 *
 * Routes every network request a page issues while serving one caller
 * request. Sub-resources go through with the browser's own request data
 * (headers reconciled by the configured policy); the single request that
 * stands in for the caller's fetch also gets the caller's method and body.
 */

import type { Page, Request as BrowserRequest, Route } from 'playwright-core';
import type { FetchRequest } from '../types/index.js';
import { isTargetClosedError } from '../types/errors.js';
import { decodeBody } from '../utils/encoding.js';
import { logger } from '../utils/logger.js';
import { statKey, type StatsCollector } from '../utils/stats.js';
import type { ResourceConfig } from './resource-config.js';

const log = logger.interceptor;

export type ContinueOverrides = NonNullable<Parameters<Route['continue']>[0]>;

/**
 * One-shot flag marking that the caller's primary request was reconciled
 * during this page load.
 */
export class InterceptedRequestState {
  private matched = false;

  get primaryMatched(): boolean {
    return this.matched;
  }

  /**
   * Returns true the first time only
   */
  claimPrimary(): boolean {
    if (this.matched) {
      return false;
    }
    this.matched = true;
    return true;
  }
}

export interface RequestInterceptorOptions {
  config: ResourceConfig;
  stats: StatsCollector;
  contextName: string;
  request: FetchRequest;
}

export class RequestInterceptor {
  readonly state = new InterceptedRequestState();
  private readonly config: ResourceConfig;
  private readonly stats: StatsCollector;
  private readonly contextName: string;
  private readonly request: FetchRequest;

  constructor(options: RequestInterceptorOptions) {
    this.config = options.config;
    this.stats = options.stats;
    this.contextName = options.contextName;
    this.request = options.request;
  }

  /**
   * Replace any route left on the page by an earlier request with this one
   */
  async install(page: Page): Promise<void> {
    await page.unroute('**');
    await page.route('**', (route, browserRequest) => this.handle(route, browserRequest));
  }

  async handle(route: Route, browserRequest: BrowserRequest): Promise<void> {
    const request = this.request;
    const logContext = {
      contextName: this.contextName,
      url: request.url,
      method: request.method,
      browserRequestUrl: browserRequest.url(),
      browserRequestMethod: browserRequest.method(),
    };

    if (this.config.abortRequest && (await this.config.abortRequest(browserRequest))) {
      await route.abort();
      log.debug('Aborted browser request', logContext);
      this.stats.incValue(statKey('request_count', 'aborted'));
      return;
    }

    const overrides: ContinueOverrides = {};
    let finalHeaders: Record<string, string>;
    if (this.config.processRequestHeaders === null) {
      finalHeaders = await browserRequest.allHeaders();
    } else {
      finalHeaders = await this.config.processRequestHeaders({
        browserType: this.config.browserType,
        browserRequest,
        callerRequest: {
          method: request.method,
          url: request.url,
          headers: request.headers,
          body: request.body,
          encoding: request.encoding,
        },
      });
      overrides.headers = finalHeaders;
    }

    if (this.isPrimaryCandidate(browserRequest) && this.state.claimPrimary()) {
      if (request.method.toUpperCase() !== browserRequest.method().toUpperCase()) {
        overrides.method = request.method;
      }
      if (request.body && request.body.length > 0) {
        overrides.postData = decodeBody(request.body, request.encoding);
      }
      // the caller sees exactly what was sent
      request.headers.clear();
      request.headers.update(finalHeaders);
    }

    const originalMethod = browserRequest.method();
    try {
      await route.continue(overrides);
      if (overrides.method) {
        log.debug('Overridden method for browser request', {
          ...logContext,
          originalMethod,
          newMethod: overrides.method,
        });
      }
    } catch (error) {
      if (!isTargetClosedError(error)) {
        throw error;
      }
      log.warn('Failed processing browser request', { ...logContext, error });
    }
  }

  private isPrimaryCandidate(browserRequest: BrowserRequest): boolean {
    return (
      stripTrailingSlashes(browserRequest.url()) === stripTrailingSlashes(this.request.url) &&
      browserRequest.isNavigationRequest()
    );
  }
}

function stripTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, '');
}
