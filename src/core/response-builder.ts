/**
 * ResponseBuilder
 *
 * Turns a completed download or a settled page into the response handed back
 * to the crawling engine. Bodies are always decoded already, so any
 * content-encoding header is dropped.
 */

import mime from 'mime-types';
import type { FetchRequest, ResponseKind } from '../types/index.js';
import { charsetFromContentType, decodeBody, DEFAULT_ENCODING, encodeBody } from '../utils/encoding.js';
import { HeaderMap, type HeaderInit } from '../utils/headers.js';
import type { DownloadRecord } from './navigation-coordinator.js';

/** Flag carried by every response fetched through the browser */
export const BROWSER_FLAG = 'browser';

// Bytes inspected when guessing whether an untyped body is binary
const SNIFF_LENGTH = 1024;

export interface BrowserResponseInit {
  url: string;
  status: number;
  headers: HeaderMap;
  body: Buffer;
  encoding: string;
  request: FetchRequest;
  flags?: string[];
  ipAddress?: string;
}

export class BrowserResponse {
  readonly url: string;
  readonly status: number;
  readonly headers: HeaderMap;
  readonly body: Buffer;
  readonly encoding: string;
  readonly kind: ResponseKind;
  readonly flags: readonly string[];
  readonly ipAddress?: string;
  readonly request: FetchRequest;

  constructor(init: BrowserResponseInit) {
    this.url = init.url;
    this.status = init.status;
    this.headers = init.headers;
    this.body = init.body;
    this.encoding = init.encoding;
    this.request = init.request;
    this.flags = init.flags ?? [];
    this.ipAddress = init.ipAddress;
    this.kind = detectResponseKind(init.headers, init.url, init.body);
  }

  text(): string {
    return decodeBody(this.body, this.encoding);
  }
}

/**
 * What a settled page produced
 */
export interface PageSnapshot {
  url: string;
  status: number;
  headers: HeaderInit;
  content: string;
  ipAddress?: string;
}

export class ResponseBuilder {
  fromDownload(request: FetchRequest, download: DownloadRecord): BrowserResponse {
    request.meta.suggestedFilename = download.suggestedFilename;
    const headers = withoutContentEncoding(download.headers);
    return new BrowserResponse({
      url: download.url,
      status: download.responseStatus,
      headers,
      body: download.body,
      encoding: charsetFromContentType(headers.get('content-type')) ?? DEFAULT_ENCODING,
      request,
      flags: [BROWSER_FLAG],
    });
  }

  fromPage(request: FetchRequest, snapshot: PageSnapshot): BrowserResponse {
    const headers = withoutContentEncoding(snapshot.headers);
    const { body, encoding } = encodeBody(headers, snapshot.content);
    return new BrowserResponse({
      url: snapshot.url,
      status: snapshot.status,
      headers,
      body,
      encoding,
      request,
      flags: [BROWSER_FLAG],
      ipAddress: snapshot.ipAddress,
    });
  }
}

function withoutContentEncoding(init: HeaderInit): HeaderMap {
  const headers = new HeaderMap(init);
  headers.delete('content-encoding');
  return headers;
}

/**
 * Kind of a response body, from its Content-Type, else the URL's
 * extension, else a look at the bytes.
 */
export function detectResponseKind(headers: HeaderMap, url: string, body: Buffer): ResponseKind {
  const mimeType = essence(headers.get('content-type')) ?? mimeFromUrl(url);
  const kind = mimeType ? kindFromMime(mimeType) : undefined;
  if (kind) {
    return kind;
  }
  return body.subarray(0, SNIFF_LENGTH).includes(0) ? 'binary' : 'text';
}

function essence(contentType: string | undefined): string | undefined {
  const value = contentType?.split(';')[0].trim().toLowerCase();
  return value || undefined;
}

function mimeFromUrl(url: string): string | undefined {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return undefined;
  }
  return mime.lookup(pathname) || undefined;
}

function kindFromMime(mimeType: string): ResponseKind | undefined {
  if (mimeType === 'text/html' || mimeType === 'application/xhtml+xml') {
    return 'html';
  }
  if (mimeType === 'application/json' || mimeType.endsWith('+json')) {
    return 'json';
  }
  if (mimeType === 'text/xml' || mimeType === 'application/xml' || mimeType.endsWith('+xml')) {
    return 'xml';
  }
  if (mimeType.startsWith('text/') || mimeType === 'application/javascript') {
    return 'text';
  }
  if (mimeType === 'application/octet-stream') {
    return undefined;
  }
  return 'binary';
}
