import { describe, it, expect } from 'vitest';
import { useBrowserHeaders, useCallerHeaders } from '../../src/core/headers.js';
import type { BrowserTypeName, CallerRequestData } from '../../src/types/index.js';
import { HeaderMap } from '../../src/utils/headers.js';
import { asRequest, fakeRequest } from '../fakes/playwright.js';

function callerRequest(headers: Record<string, string>): CallerRequestData {
  return {
    method: 'GET',
    url: 'https://example.com/',
    headers: new HeaderMap(headers),
    encoding: 'utf-8',
  };
}

const browserHeaders = { 'user-agent': 'FakeBrowser/1.0', accept: 'image/*', referer: 'https://example.com/' };

async function callerPolicy(
  browserType: BrowserTypeName,
  navigation: boolean,
  headers: Record<string, string>,
  ownHeaders: Record<string, string> = browserHeaders
) {
  return useCallerHeaders({
    browserType,
    browserRequest: asRequest(
      fakeRequest({ url: 'https://example.com:8443/page', navigation, headers: ownHeaders })
    ),
    callerRequest: callerRequest(headers),
  });
}

describe('useCallerHeaders', () => {
  it('should send the caller headers for navigation requests', async () => {
    const headers = await callerPolicy('chromium', true, { 'User-Agent': 'crawler/2.0', 'X-Token': 'test-secret' });
    expect(headers).toEqual({ 'user-agent': 'crawler/2.0', 'x-token': 'test-secret' });
  });

  it('should fill in the browser user agent when the caller has none', async () => {
    const headers = await callerPolicy('chromium', true, { accept: 'text/html' });
    expect(headers).toEqual({ accept: 'text/html', 'user-agent': 'FakeBrowser/1.0' });
  });

  it('should set the host header for firefox navigations', async () => {
    const headers = await callerPolicy('firefox', true, { 'user-agent': 'crawler/2.0' });
    expect(headers).toEqual({ 'user-agent': 'crawler/2.0', host: 'example.com:8443' });
  });

  it('should keep browser headers for sub-resources with the caller user agent', async () => {
    const headers = await callerPolicy('chromium', false, { 'user-agent': 'crawler/2.0', 'x-token': 'test-secret' });
    expect(headers).toEqual({ ...browserHeaders, 'user-agent': 'crawler/2.0' });
  });

  it('should return the browser headers when no user agent is known', async () => {
    const headers = await callerPolicy('webkit', false, {}, { accept: '*/*' });
    expect(headers).toEqual({ accept: '*/*' });
  });
});

describe('useBrowserHeaders', () => {
  it('should send the browser headers unaltered', async () => {
    const headers = await useBrowserHeaders({
      browserType: 'chromium',
      browserRequest: asRequest(fakeRequest({ url: 'https://example.com/', headers: browserHeaders })),
      callerRequest: callerRequest({ 'user-agent': 'crawler/2.0' }),
    });
    expect(headers).toEqual(browserHeaders);
  });
});
