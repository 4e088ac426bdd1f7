import { describe, it, expect } from 'vitest';
import { ContextPool } from '../../src/core/context-pool.js';
import { ResourceConfig, type ResourceConfigOptions } from '../../src/core/resource-config.js';
import { PoolClosedError } from '../../src/types/errors.js';
import { MemoryStatsCollector } from '../../src/utils/stats.js';
import { asBrowserType, FakeBrowserType, type FakeBrowser, TARGET_CLOSED } from '../fakes/playwright.js';

const tick = () => new Promise((resolve) => setImmediate(resolve));

function createPool(options: ResourceConfigOptions = {}) {
  const browserType = new FakeBrowserType();
  const stats = new MemoryStatsCollector();
  const pool = new ContextPool({
    config: ResourceConfig.fromOptions(options),
    stats,
    browserType: asBrowserType(browserType),
  });
  return { pool, browserType, stats };
}

function latestBrowser(browserType: FakeBrowserType): FakeBrowser {
  const browser = browserType.latestBrowser;
  if (!browser) {
    throw new Error('no browser was launched');
  }
  return browser;
}

describe('ContextPool', () => {
  describe('acquire', () => {
    it('should launch the browser lazily and only once', async () => {
      const { pool, browserType, stats } = createPool();
      expect(browserType.launchCalls).toHaveLength(0);

      await pool.acquire('a');
      await pool.acquire('b');

      expect(browserType.launchCalls).toHaveLength(1);
      expect(pool.names()).toEqual(['a', 'b']);
      expect(stats.getValue('browser/browser_count')).toBe(1);
      expect(stats.getValue('browser/context_count')).toBe(2);
      expect(stats.getValue('browser/context_count/max_concurrent')).toBe(2);
      expect(stats.getValue('browser/context_count/persistent/false')).toBe(2);
      expect(stats.getValue('browser/context_count/remote/false')).toBe(2);
    });

    it('should share one creation between concurrent acquisitions of a name', async () => {
      const { pool, browserType, stats } = createPool();

      const wrappers = await Promise.all([1, 2, 3, 4, 5].map(() => pool.acquire('shared')));

      expect(new Set(wrappers).size).toBe(1);
      expect(latestBrowser(browserType).contexts()).toHaveLength(1);
      expect(stats.getValue('browser/context_count')).toBe(1);
    });

    it('should use the default context name', async () => {
      const { pool } = createPool();
      const wrapper = await pool.acquire();
      expect(wrapper.name).toBe('default');
    });

    it('should apply context options only when creating the context', async () => {
      const { pool, browserType } = createPool();

      await pool.acquire('a', { userAgent: 'first' });
      await pool.acquire('a', { userAgent: 'second' });

      const contexts = latestBrowser(browserType).contexts();
      expect(contexts).toHaveLength(1);
      expect(contexts[0].options).toEqual({ userAgent: 'first' });
    });

    it('should launch persistent contexts on their own', async () => {
      const { pool, browserType, stats } = createPool();

      const wrapper = await pool.acquire('profile', { userDataDir: '/tmp/profile', locale: 'en-US' });

      expect(wrapper.persistent).toBe(true);
      expect(wrapper.remote).toBe(false);
      expect(browserType.launchCalls).toHaveLength(0);
      expect(browserType.persistentContexts[0].options).toEqual({
        userDataDir: '/tmp/profile',
        options: { locale: 'en-US' },
      });
      expect(stats.getValue('browser/context_count/persistent/true')).toBe(1);
    });

    it('should set the navigation timeout on new contexts', async () => {
      const { pool, browserType } = createPool({ navigationTimeout: 5000 });
      await pool.acquire('a');
      expect(latestBrowser(browserType).contexts()[0].navigationTimeout).toBe(5000);
    });

    it('should leave the navigation timeout alone when unset', async () => {
      const { pool, browserType } = createPool();
      await pool.acquire('a');
      expect(latestBrowser(browserType).contexts()[0].navigationTimeout).toBeNull();
    });
  });

  describe('remote browsers', () => {
    it('should attach over CDP', async () => {
      const cdpOptions = { slowMo: 5, endpointURL: 'http://ignored:9222' };
      const { pool, browserType, stats } = createPool({ cdpUrl: 'http://localhost:9222', cdpOptions });

      const wrapper = await pool.acquire('a');

      expect(browserType.cdpCalls).toEqual([{ url: 'http://localhost:9222', options: { slowMo: 5 } }]);
      expect(browserType.launchCalls).toHaveLength(0);
      expect(wrapper.remote).toBe(true);
      expect(stats.getValue('browser/context_count/remote/true')).toBe(1);
    });

    it('should attach over the connect protocol', async () => {
      const { pool, browserType } = createPool({ connectUrl: 'ws://localhost:3000/browser' });

      const wrapper = await pool.acquire('a');

      expect(browserType.connectCalls).toEqual([{ url: 'ws://localhost:3000/browser', options: {} }]);
      expect(wrapper.remote).toBe(true);
    });
  });

  describe('context ceiling', () => {
    it('should block new contexts until one closes', async () => {
      const { pool } = createPool({ maxContexts: 1 });
      const first = await pool.acquire('a');

      let acquired = false;
      const second = pool.acquire('b').then((wrapper) => {
        acquired = true;
        return wrapper;
      });
      await tick();
      expect(acquired).toBe(false);

      await first.context.close();
      const wrapper = await second;

      expect(wrapper.name).toBe('b');
      expect(pool.names()).toEqual(['b']);
    });

    it('should hand back the slot when creation fails', async () => {
      const { pool, browserType } = createPool({ maxContexts: 1 });
      browserType.launchFailures = 1;

      await expect(pool.acquire('a')).rejects.toThrow('browserType.launch: Executable does not exist');

      const wrapper = await pool.acquire('a');
      expect(wrapper.name).toBe('a');
      expect(browserType.launchCalls).toHaveLength(2);
    });
  });

  describe('closed contexts', () => {
    it('should drop a closed context so the next acquisition recreates it', async () => {
      const { pool } = createPool();
      const first = await pool.acquire('a');

      await first.context.close();
      expect(pool.get('a')).toBeUndefined();

      const second = await pool.acquire('a');
      expect(second).not.toBe(first);
    });
  });

  describe('startup contexts', () => {
    it('should create every startup context', async () => {
      const { pool, browserType, stats } = createPool({ startupContexts: { one: {}, two: { locale: 'fr-FR' } } });

      await pool.launchStartupContexts();

      expect([...pool.names()].sort()).toEqual(['one', 'two']);
      expect(browserType.launchCalls).toHaveLength(1);
      expect(stats.getValue('browser/page_count')).toBe(0);
    });

    it('should do nothing without startup contexts', async () => {
      const { pool, browserType } = createPool();
      await pool.launchStartupContexts();
      expect(browserType.launchCalls).toHaveLength(0);
    });
  });

  describe('browser disconnects', () => {
    it('should flush the registry and relaunch on the next acquisition', async () => {
      const { pool, browserType, stats } = createPool();
      await pool.acquire('a');

      latestBrowser(browserType).crash();
      expect(pool.size).toBe(0);

      const wrapper = await pool.acquire('a');
      expect(wrapper.name).toBe('a');
      expect(browserType.launchCalls).toHaveLength(2);
      expect(stats.getValue('browser/browser_count')).toBe(2);
    });

    it('should keep the dead browser when restarts are disabled', async () => {
      const { pool, browserType } = createPool({ restartDisconnectedBrowser: false });
      await pool.acquire('a');

      latestBrowser(browserType).crash();
      await tick();

      await expect(pool.acquire('a')).rejects.toThrow(TARGET_CLOSED);
      expect(browserType.launchCalls).toHaveLength(1);
    });
  });

  describe('close', () => {
    it('should close the contexts and the browser', async () => {
      const { pool, browserType } = createPool();
      const wrapper = await pool.acquire('a');

      await pool.close();

      expect(pool.size).toBe(0);
      expect(latestBrowser(browserType).isConnected()).toBe(false);
      expect(wrapper.context.pages()).toEqual([]);
    });

    it('should refuse new contexts afterwards', async () => {
      const { pool } = createPool();
      await pool.close();
      await expect(pool.acquire('a')).rejects.toThrow(PoolClosedError);
    });
  });

  describe('totalPageCount', () => {
    it('should count open pages across contexts', async () => {
      const { pool } = createPool();
      const a = await pool.acquire('a');
      const b = await pool.acquire('b');

      await a.context.newPage();
      await a.context.newPage();
      await b.context.newPage();

      expect(pool.totalPageCount()).toBe(3);
    });
  });
});
