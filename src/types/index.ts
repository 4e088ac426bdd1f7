/**
 * Core types for the browser fetch bridge
 *
 * The request/response model mirrors what a request/response crawling engine
 * hands to a download handler: a request with headers, method, body and an
 * options bag, and a response with byte-exact body and encoding.
 */

import type {
  BrowserContextOptions,
  Page,
  Request as BrowserRequest,
  Response as BrowserNetworkResponse,
} from 'playwright-core';
import type { HeaderMap } from '../utils/headers.js';
import type { PageMethod } from '../core/page-methods.js';
import type { BrowserResponse } from '../core/response-builder.js';

export * from './errors.js';

export type BrowserTypeName = 'chromium' | 'firefox' | 'webkit';

/**
 * Options used to create a browsing context. A `userDataDir` makes the
 * context persistent: it is launched on its own, backed by that profile.
 */
export type ContextOptions = BrowserContextOptions & {
  userDataDir?: string;
};

export type GotoOptions = NonNullable<Parameters<Page['goto']>[1]>;

export type SecurityDetails = Awaited<ReturnType<BrowserNetworkResponse['securityDetails']>>;

export type PageEventListener = (...args: unknown[]) => unknown;

/**
 * Callback run once right after a page is created for a request.
 */
export type PageInitCallback = (page: Page, request: FetchRequest) => Promise<void> | void;

/**
 * Per-request options bag
 */
export interface BrowserRequestOptions {
  /** Fetch through the browser instead of the fallback HTTP fetcher */
  browser?: boolean;
  /** Name of the context to use; created lazily on first reference */
  context?: string;
  /** Options for creating the context when it does not exist yet */
  contextOptions?: ContextOptions;
  /** Keep the page open and hand it back in `meta.page` */
  includePage?: boolean;
  /** A page handed back by an earlier request; reused while it is open */
  page?: Page;
  /** Scripted steps, run in order after navigation */
  pageMethods?: ReadonlyArray<PageMethod> | Readonly<Record<string, PageMethod>>;
  /** Page event listeners, or names of methods on the fetcher's handler host */
  pageEventHandlers?: Readonly<Record<string, PageEventListener | string>>;
  pageInitCallback?: PageInitCallback;
  /** Extra page.goto() options; the URL always comes from the request */
  gotoOptions?: GotoOptions & { url?: string };
}

/**
 * Bookkeeping written back onto the request while it is processed
 */
export interface RequestMeta {
  context?: string;
  page?: Page;
  redirectTimes?: number;
  redirectUrls?: string[];
  redirectReasons?: Array<number | null>;
  securityDetails?: SecurityDetails;
  downloadLatencyMs?: number;
  suggestedFilename?: string;
}

export interface FetchRequest {
  url: string;
  method: string;
  headers: HeaderMap;
  body?: Buffer;
  encoding: string;
  options: BrowserRequestOptions;
  meta: RequestMeta;
}

/**
 * The caller-side data handed to header policies
 */
export interface CallerRequestData {
  method: string;
  url: string;
  headers: HeaderMap;
  body?: Buffer;
  encoding: string;
}

export interface HeaderPolicyArgs {
  browserType: BrowserTypeName;
  browserRequest: BrowserRequest;
  callerRequest: CallerRequestData;
}

/**
 * Computes the headers sent with an intercepted browser request
 */
export type HeaderPolicy = (
  args: HeaderPolicyArgs
) => Record<string, string> | Promise<Record<string, string>>;

/**
 * Decides whether an intercepted browser request is aborted
 */
export type AbortPredicate = (request: BrowserRequest) => boolean | Promise<boolean>;

export type ResponseKind = 'html' | 'xml' | 'json' | 'text' | 'binary';

/**
 * Anything able to turn a request into a response
 */
export interface Fetcher {
  fetch(request: FetchRequest): Promise<BrowserResponse>;
}
