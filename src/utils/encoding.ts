/**
 * Charset negotiation for page content
 *
 * page.content() hands back a decoded string; the crawling engine expects
 * bytes plus the encoding they are in. The encoding is picked from the
 * Content-Type header, then the charset the document declares, then UTF-8.
 */

import iconv from 'iconv-lite';
import type { HeaderMap } from './headers.js';

export const DEFAULT_ENCODING = 'utf-8';

// Declarations are only looked for near the top of the document
const DECLARATION_SCAN_LENGTH = 4096;

const CONTENT_TYPE_CHARSET = /charset\s*=\s*["']?\s*([^"';\s]+)/i;
const META_CHARSET = /<meta\b[^>]*?\bcharset\s*=\s*["']?\s*([\w.:+-]+)/i;
const XML_DECLARATION = /^\s*<\?xml\b[^>]*?\bencoding\s*=\s*["']([\w.:+-]+)["']/i;

// Labels browsers decode with a superset charset; page.content() reflects the superset
const BROWSER_CHARSETS: Readonly<Record<string, string>> = {
  'iso-8859-1': 'windows-1252',
  'iso8859-1': 'windows-1252',
  latin1: 'windows-1252',
  l1: 'windows-1252',
  ascii: 'windows-1252',
  'us-ascii': 'windows-1252',
  'iso-8859-9': 'windows-1254',
  latin5: 'windows-1254',
  'iso-8859-11': 'windows-874',
  'tis-620': 'windows-874',
  gb2312: 'gb18030',
  gbk: 'gb18030',
  'x-gbk': 'gb18030',
  'euc-kr': 'cp949',
  shift_jis: 'cp932',
  'x-sjis': 'cp932',
  big5: 'big5hkscs',
};

export interface EncodedBody {
  body: Buffer;
  encoding: string;
}

/**
 * The charset parameter of a Content-Type value, lowercased
 */
export function charsetFromContentType(contentType: string | undefined): string | undefined {
  const match = contentType ? CONTENT_TYPE_CHARSET.exec(contentType) : null;
  return match ? match[1].toLowerCase() : undefined;
}

/**
 * The charset declared inside the document: an XML declaration,
 * `<meta charset>` or `<meta http-equiv="Content-Type" content="...; charset=...">`.
 */
export function documentDeclaredCharset(text: string): string | undefined {
  const head = text.slice(0, DECLARATION_SCAN_LENGTH);
  const match = XML_DECLARATION.exec(head) ?? META_CHARSET.exec(head);
  return match ? match[1].toLowerCase() : undefined;
}

/**
 * The charset a browser actually decodes a page labelled `label` with
 */
export function browserCharset(label: string): string {
  const normalized = label.trim().toLowerCase();
  return BROWSER_CHARSETS[normalized] ?? normalized;
}

/**
 * True if `encoding` is known and can represent every character of `text`
 */
export function canEncode(text: string, encoding: string): boolean {
  if (!iconv.encodingExists(encoding)) {
    return false;
  }
  return iconv.decode(iconv.encode(text, encoding), encoding) === text;
}

/**
 * Encode page text into bytes, negotiating the charset. Header and document
 * labels are mapped to the charset browsers use for them first.
 */
export function encodeBody(headers: HeaderMap, text: string): EncodedBody {
  const candidates = [
    charsetFromContentType(headers.get('content-type')),
    documentDeclaredCharset(text),
  ];

  for (const label of candidates) {
    const encoding = label && browserCharset(label);
    if (encoding && canEncode(text, encoding)) {
      return { body: iconv.encode(text, encoding), encoding };
    }
  }

  return { body: Buffer.from(text, 'utf8'), encoding: DEFAULT_ENCODING };
}

/**
 * Decode a body with a negotiated encoding, falling back to UTF-8 for
 * encodings the codec tables do not know.
 */
export function decodeBody(body: Buffer, encoding: string): string {
  if (iconv.encodingExists(encoding)) {
    return iconv.decode(body, encoding);
  }
  return body.toString('utf8');
}

/**
 * Encode a request body string with the request's encoding
 */
export function encodeText(text: string, encoding: string): Buffer {
  return iconv.encodingExists(encoding) ? iconv.encode(text, encoding) : Buffer.from(text, 'utf8');
}
