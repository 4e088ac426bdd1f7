/**
 * PageAllocator
 *
 * Opens pages inside a context, bounded by the context's page semaphore.
 * The slot a page holds is released once, by whichever of the page's close
 * or crash events fires first.
 */

import type { Page, Request as BrowserRequest, Response as BrowserNetworkResponse } from 'playwright-core';
import type { FetchRequest } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { statKey, type StatsCollector } from '../utils/stats.js';
import type { ContextPool, ContextWrapper } from './context-pool.js';
import type { ResourceConfig } from './resource-config.js';

const log = logger.pages;

export class PageAllocator {
  constructor(
    private readonly pool: ContextPool,
    private readonly config: ResourceConfig,
    private readonly stats: StatsCollector
  ) {}

  /**
   * Open a page in `wrapper`'s context, waiting for a free page slot
   */
  async newPage(wrapper: ContextWrapper, request?: FetchRequest): Promise<Page> {
    await wrapper.semaphore.acquire();

    let page: Page;
    try {
      page = await wrapper.context.newPage();
    } catch (error) {
      wrapper.semaphore.release();
      throw error;
    }

    this.stats.incValue(statKey('page_count'));
    const totalPageCount = this.pool.totalPageCount();
    log.debug('New page created', {
      contextName: wrapper.name,
      contextPageCount: wrapper.context.pages().length,
      totalPageCount,
      url: request?.url,
      method: request?.method,
    });
    this.stats.maxValue(statKey('page_count', 'max_concurrent'), totalPageCount);

    if (this.config.navigationTimeout !== null) {
      page.setDefaultNavigationTimeout(this.config.navigationTimeout);
    }

    const releaseSlot = this.makeReleaseSlot(wrapper);
    page.on('close', releaseSlot);
    page.on('crash', releaseSlot);

    page.on('request', (browserRequest) => {
      this.recordRequest(browserRequest);
      logRequest(wrapper.name, browserRequest).catch((error: unknown) => {
        log.debug('Could not log browser request', { contextName: wrapper.name, error });
      });
    });
    page.on('response', (response) => {
      this.recordResponse(response);
      logResponse(wrapper.name, response).catch((error: unknown) => {
        log.debug('Could not log browser response', { contextName: wrapper.name, error });
      });
    });

    return page;
  }

  private makeReleaseSlot(wrapper: ContextWrapper): () => void {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      // a wrapper dropped from the registry takes its semaphore with it
      if (this.pool.get(wrapper.name) === wrapper) {
        wrapper.semaphore.release();
      }
    };
  }

  private recordRequest(browserRequest: BrowserRequest): void {
    const prefix = 'request_count';
    this.stats.incValue(statKey(prefix));
    this.stats.incValue(statKey(prefix, 'resource_type', browserRequest.resourceType()));
    this.stats.incValue(statKey(prefix, 'method', browserRequest.method()));
    if (browserRequest.isNavigationRequest()) {
      this.stats.incValue(statKey(prefix, 'navigation'));
    }
  }

  private recordResponse(response: BrowserNetworkResponse): void {
    const prefix = 'response_count';
    const browserRequest = response.request();
    this.stats.incValue(statKey(prefix));
    this.stats.incValue(statKey(prefix, 'resource_type', browserRequest.resourceType()));
    this.stats.incValue(statKey(prefix, 'method', browserRequest.method()));
  }
}

async function logRequest(contextName: string, browserRequest: BrowserRequest): Promise<void> {
  const referrer = await browserRequest.headerValue('referer');
  log.debug('Request', {
    contextName,
    browserRequestMethod: browserRequest.method().toUpperCase(),
    browserRequestUrl: browserRequest.url(),
    resourceType: browserRequest.resourceType(),
    ...(referrer ? { referrer } : {}),
  });
}

async function logResponse(contextName: string, response: BrowserNetworkResponse): Promise<void> {
  const location = await response.headerValue('location');
  log.debug('Response', {
    contextName,
    status: response.status(),
    responseUrl: response.url(),
    ...(location ? { location } : {}),
  });
}
