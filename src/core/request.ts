/**
 * Building caller requests
 */

import type { BrowserRequestOptions, FetchRequest, RequestMeta } from '../types/index.js';
import { DEFAULT_ENCODING, encodeText } from '../utils/encoding.js';
import { HeaderMap, type HeaderInit } from '../utils/headers.js';

export interface FetchRequestInit {
  url: string;
  method?: string;
  /** A HeaderMap is used as is, so the caller observes the headers actually sent */
  headers?: HeaderMap | HeaderInit;
  /** Strings are encoded with `encoding` */
  body?: Buffer | string;
  encoding?: string;
  options?: BrowserRequestOptions;
  meta?: RequestMeta;
}

export function createRequest(init: FetchRequestInit): FetchRequest {
  const encoding = init.encoding ?? DEFAULT_ENCODING;
  return {
    url: init.url,
    method: (init.method ?? 'GET').toUpperCase(),
    headers: init.headers instanceof HeaderMap ? init.headers : new HeaderMap(init.headers),
    body: typeof init.body === 'string' ? encodeText(init.body, encoding) : init.body,
    encoding,
    options: { ...init.options },
    meta: { ...init.meta },
  };
}
