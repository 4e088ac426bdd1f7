/**
 * HttpFetcher
 *
 * Plain HTTP fetcher used for requests that do not ask for the browser.
 */

import type { Fetcher, FetchRequest } from '../types/index.js';
import { charsetFromContentType, DEFAULT_ENCODING } from '../utils/encoding.js';
import { HeaderMap } from '../utils/headers.js';
import { logger } from '../utils/logger.js';
import { getTimeout } from '../utils/timeouts.js';
import { BrowserResponse } from './response-builder.js';

const log = logger.http;

const BODYLESS_METHODS = new Set(['GET', 'HEAD']);

export interface HttpFetcherOptions {
  timeoutMs?: number;
  /** Defaults to the global fetch */
  fetchImpl?: typeof fetch;
}

export class HttpFetcher implements Fetcher {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpFetcherOptions = {}) {
    this.timeoutMs = getTimeout('NETWORK_FETCH', options.timeoutMs);
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetch(request: FetchRequest): Promise<BrowserResponse> {
    const startTime = Date.now();
    const response = await this.fetchImpl(request.url, {
      method: request.method,
      headers: request.headers.toRecord(),
      body: BODYLESS_METHODS.has(request.method) ? undefined : request.body,
      redirect: 'follow',
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    const body = Buffer.from(await response.arrayBuffer());
    request.meta.downloadLatencyMs = Date.now() - startTime;

    const headers = new HeaderMap();
    response.headers.forEach((value, name) => headers.set(name, value));
    // fetch hands back the decoded body
    headers.delete('content-encoding');

    log.timed('Fetched over HTTP', startTime, { url: request.url, method: request.method, status: response.status });

    return new BrowserResponse({
      url: response.url || request.url,
      status: response.status,
      headers,
      body,
      encoding: charsetFromContentType(headers.get('content-type')) ?? DEFAULT_ENCODING,
      request,
    });
  }
}
