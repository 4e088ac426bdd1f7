/**
 * ContextPool
 *
 * Owns the shared browser and the registry of named browsing contexts.
 *
 * - The browser is launched (or attached to) lazily, once, under a launch lock
 * - Contexts are created on first reference by name; concurrent first
 *   references to the same name share a single creation
 * - An optional global ceiling bounds the number of live contexts
 * - When the browser disconnects the registry is flushed and, unless
 *   disabled, the next acquisition relaunches it
 */

import {
  chromium,
  firefox,
  webkit,
  type Browser,
  type BrowserContext,
  type BrowserType,
} from 'playwright-core';
import type { BrowserTypeName, ContextOptions } from '../types/index.js';
import { isTargetClosedError, PoolClosedError } from '../types/errors.js';
import { Mutex, Semaphore } from '../utils/async-primitives.js';
import { poolClosedError, remoteBrowserConnectionError } from '../utils/error-messages.js';
import { logger } from '../utils/logger.js';
import { statKey, type StatsCollector } from '../utils/stats.js';
import { DEFAULT_CONTEXT_NAME, type ResourceConfig } from './resource-config.js';

const log = logger.pool;

const BROWSER_TYPES: Record<BrowserTypeName, BrowserType> = { chromium, firefox, webkit };

/**
 * One browsing context and the semaphore bounding its concurrent pages
 */
export interface ContextWrapper {
  readonly name: string;
  readonly context: BrowserContext;
  readonly semaphore: Semaphore;
  /** Backed by an on-disk profile, launched on its own */
  readonly persistent: boolean;
  /** Carved out of a browser attached over CDP or the connect protocol */
  readonly remote: boolean;
}

export interface ContextPoolOptions {
  config: ResourceConfig;
  stats: StatsCollector;
  /** Engine to launch; defaults to the one named by the configuration */
  browserType?: BrowserType;
}

export class ContextPool {
  private readonly config: ResourceConfig;
  private readonly stats: StatsCollector;
  private readonly browserType: BrowserType;
  private readonly wrappers = new Map<string, ContextWrapper>();
  private readonly pendingCreations = new Map<string, Promise<ContextWrapper>>();
  private readonly browserLaunchLock = new Mutex();
  private readonly contextCeiling: Semaphore | null;
  private browser: Browser | null = null;
  private closed = false;

  constructor(options: ContextPoolOptions) {
    this.config = options.config;
    this.stats = options.stats;
    this.browserType = options.browserType ?? BROWSER_TYPES[options.config.browserType];
    this.contextCeiling = options.config.maxContexts ? new Semaphore(options.config.maxContexts) : null;
  }

  /**
   * Get the context registered under `name`, creating it if needed.
   * `contextOptions` only apply when the context is created by this call.
   */
  async acquire(name: string = DEFAULT_CONTEXT_NAME, contextOptions?: ContextOptions): Promise<ContextWrapper> {
    const existing = this.wrappers.get(name);
    if (existing) {
      return existing;
    }

    const pending = this.pendingCreations.get(name);
    if (pending) {
      return pending;
    }

    if (this.closed) {
      throw new PoolClosedError(poolClosedError(name));
    }

    const creation = this.createContext(name, contextOptions).finally(() => {
      this.pendingCreations.delete(name);
    });
    this.pendingCreations.set(name, creation);
    return creation;
  }

  /**
   * Create every configured startup context concurrently
   */
  async launchStartupContexts(): Promise<void> {
    const entries = Object.entries(this.config.startupContexts);
    if (entries.length === 0) {
      return;
    }

    log.info('Launching startup contexts', { count: entries.length });
    await Promise.all(entries.map(([name, options]) => this.acquire(name, options)));
    log.info('Startup contexts launched', { contextNames: this.names() });
    this.stats.setValue(statKey('page_count'), this.totalPageCount());
  }

  get(name: string): ContextWrapper | undefined {
    return this.wrappers.get(name);
  }

  get size(): number {
    return this.wrappers.size;
  }

  names(): string[] {
    return [...this.wrappers.keys()];
  }

  /**
   * Open pages across every registered context
   */
  totalPageCount(): number {
    let count = 0;
    for (const wrapper of this.wrappers.values()) {
      count += wrapper.context.pages().length;
    }
    return count;
  }

  /**
   * Close every context and the shared browser. Target-closed errors from
   * contexts that were already going away are ignored.
   */
  async close(): Promise<void> {
    this.closed = true;
    const wrappers = [...this.wrappers.values()];
    this.wrappers.clear();
    await closeContexts(wrappers);

    const browser = this.browser;
    this.browser = null;
    if (browser) {
      log.info('Closing browser');
      await browser.close();
    }
  }

  private async createContext(name: string, contextOptions: ContextOptions = {}): Promise<ContextWrapper> {
    await this.contextCeiling?.acquire();

    let context: BrowserContext;
    let persistent = false;
    let remote = false;
    try {
      const { userDataDir, ...options } = contextOptions;
      if (userDataDir) {
        context = await this.browserType.launchPersistentContext(userDataDir, options);
        persistent = true;
      } else {
        const browser = await this.ensureBrowser();
        context = await browser.newContext(options);
        remote = this.config.attachMode !== 'launch';
      }
    } catch (error) {
      this.contextCeiling?.release();
      throw error;
    }

    const wrapper: ContextWrapper = {
      name,
      context,
      semaphore: new Semaphore(this.config.maxPagesPerContext),
      persistent,
      remote,
    };
    context.on('close', () => this.handleContextClosed(wrapper));

    this.stats.incValue(statKey('context_count'));
    this.stats.incValue(statKey('context_count', 'persistent', persistent));
    this.stats.incValue(statKey('context_count', 'remote', remote));
    log.debug('Browser context started', { contextName: name, persistent, remote });

    if (this.config.navigationTimeout !== null) {
      context.setDefaultNavigationTimeout(this.config.navigationTimeout);
    }

    this.wrappers.set(name, wrapper);
    this.stats.maxValue(statKey('context_count', 'max_concurrent'), this.wrappers.size);
    return wrapper;
  }

  private handleContextClosed(wrapper: ContextWrapper): void {
    // a context recreated under the same name keeps its entry
    if (this.wrappers.get(wrapper.name) === wrapper) {
      this.wrappers.delete(wrapper.name);
    }
    this.contextCeiling?.release();
    log.debug('Browser context closed', {
      contextName: wrapper.name,
      persistent: wrapper.persistent,
      remote: wrapper.remote,
    });
  }

  private ensureBrowser(): Promise<Browser> {
    return this.browserLaunchLock.runExclusive(async () => {
      if (this.browser) {
        return this.browser;
      }

      const browser = await this.launchBrowser();
      this.stats.incValue(statKey('browser_count'));
      browser.on('disconnected', () => {
        this.handleBrowserDisconnected(browser).catch((error: unknown) => {
          log.error('Failed to clean up after browser disconnect', { error });
        });
      });
      this.browser = browser;
      return browser;
    });
  }

  private async launchBrowser(): Promise<Browser> {
    const engine = this.browserType.name();

    if (this.config.cdpUrl) {
      const endpoint = this.config.cdpUrl;
      log.info('Connecting using CDP', { endpoint });
      const browser = await this.attach('cdp', () =>
        this.browserType.connectOverCDP(endpoint, this.config.cdpOptions)
      );
      log.info('Connected using CDP', { endpoint });
      return browser;
    }

    if (this.config.connectUrl) {
      const endpoint = this.config.connectUrl;
      log.info('Connecting to remote browser', { browserType: engine });
      const browser = await this.attach('connect', () =>
        this.browserType.connect(endpoint, this.config.connectOptions)
      );
      log.info('Connected to remote browser', { browserType: engine });
      return browser;
    }

    log.info('Launching browser', { browserType: engine });
    const browser = await this.browserType.launch(this.config.launchOptions);
    log.info('Browser launched', { browserType: engine });
    return browser;
  }

  private async attach(mode: 'cdp' | 'connect', connect: () => Promise<Browser>): Promise<Browser> {
    try {
      return await connect();
    } catch (error) {
      log.error(remoteBrowserConnectionError(mode, error instanceof Error ? error.message : undefined), { error });
      throw error;
    }
  }

  private async handleBrowserDisconnected(browser: Browser): Promise<void> {
    if (this.config.restartDisconnectedBrowser && this.browser === browser) {
      this.browser = null;
    }
    const wrappers = [...this.wrappers.values()];
    this.wrappers.clear();
    log.debug('Browser disconnected', {
      contextNames: wrappers.map((wrapper) => wrapper.name),
      restart: this.config.restartDisconnectedBrowser,
    });
    await closeContexts(wrappers);
  }
}

async function closeContexts(wrappers: ContextWrapper[]): Promise<void> {
  await Promise.all(
    wrappers.map((wrapper) =>
      wrapper.context.close().catch((error: unknown) => {
        if (!isTargetClosedError(error)) {
          throw error;
        }
      })
    )
  );
}
