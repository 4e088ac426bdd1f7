/**
 * Header reconciliation policies for intercepted browser requests
 */

import type { HeaderPolicy } from '../types/index.js';

/**
 * The caller's headers take precedence for navigation requests. For every
 * other request the browser's headers are kept, with only the caller's
 * user-agent folded in so sub-resources identify the same way.
 */
export const useCallerHeaders: HeaderPolicy = async ({ browserType, browserRequest, callerRequest }) => {
  const headers = callerRequest.headers.toRecord();
  const browserHeaders = await browserRequest.allHeaders();

  const userAgent = headers['user-agent'] ?? browserHeaders['user-agent'];
  if (userAgent !== undefined) {
    headers['user-agent'] = userAgent;
  }

  if (browserRequest.isNavigationRequest()) {
    if (browserType === 'firefox') {
      // firefox resets the connection (NS_ERROR_NET_RESET) without it
      headers.host = new URL(browserRequest.url()).host;
    }
    return headers;
  }

  if (userAgent === undefined) {
    return browserHeaders;
  }
  return { ...browserHeaders, 'user-agent': userAgent };
};

/**
 * Send the headers the browser computed, unaltered
 */
export const useBrowserHeaders: HeaderPolicy = ({ browserRequest }) => browserRequest.allHeaders();
