/**
 * browser-fetch-bridge
 *
 * Serves a crawling engine's requests through a Playwright-driven browser:
 * a pool of named browsing contexts, bounded page allocation, interception
 * that reconciles each browser request with the caller's, and the navigation
 * protocol that turns a page load or a file download into a response.
 *
 * @example
 * ```typescript
 * import { BrowserFetcher, ResourceConfig, createRequest, PageMethod } from 'browser-fetch-bridge';
 *
 * const fetcher = new BrowserFetcher({
 *   config: ResourceConfig.fromOptions({ maxPagesPerContext: 4, navigationTimeout: 10000 }),
 * });
 * await fetcher.start();
 *
 * const response = await fetcher.fetch(
 *   createRequest({
 *     url: 'https://example.com',
 *     options: { browser: true, pageMethods: [PageMethod.named('waitForTimeout', 500)] },
 *   })
 * );
 * console.log(response.status, response.text());
 *
 * await fetcher.close();
 * ```
 */

export * from './types/index.js';

export { BrowserFetcher, type BrowserFetcherOptions } from './core/browser-fetcher.js';
export { ContextPool, type ContextPoolOptions, type ContextWrapper } from './core/context-pool.js';
export { PageAllocator } from './core/page-allocator.js';
export {
  RequestInterceptor,
  InterceptedRequestState,
  type RequestInterceptorOptions,
  type ContinueOverrides,
} from './core/request-interceptor.js';
export {
  NavigationCoordinator,
  DownloadRecord,
  type NavigationOutcome,
  type RedirectHistory,
  type ServerMetadata,
} from './core/navigation-coordinator.js';
export {
  ResponseBuilder,
  BrowserResponse,
  BROWSER_FLAG,
  detectResponseKind,
  type BrowserResponseInit,
  type PageSnapshot,
} from './core/response-builder.js';
export { PageMethod, PAGE_METHOD_NAMES, isPageMethodName, type PageMethodName } from './core/page-methods.js';
export {
  ResourceConfig,
  DEFAULT_CONTEXT_NAME,
  type AttachMode,
  type ResourceConfigOptions,
} from './core/resource-config.js';
export { useCallerHeaders, useBrowserHeaders } from './core/headers.js';
export { HttpFetcher, type HttpFetcherOptions } from './core/http-fetcher.js';
export { createRequest, type FetchRequestInit } from './core/request.js';

export * from './utils/index.js';
