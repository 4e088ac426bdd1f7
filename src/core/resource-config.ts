/**
 * ResourceConfig
 *
 * The validated, immutable configuration surface of the bridge: which browser
 * to drive and how to reach it, the context and page ceilings, the navigation
 * timeout, and the header and abort policies applied to intercepted requests.
 */

import type { ConnectOptions, ConnectOverCDPOptions, LaunchOptions } from 'playwright-core';
import type { AbortPredicate, BrowserTypeName, ContextOptions, HeaderPolicy } from '../types/index.js';
import { ConfigurationError } from '../types/errors.js';
import {
  bridgeSettingsSchema,
  ConfigValidationError,
  type BridgeSettings,
  type BridgeSettingsInput,
} from '../utils/config-schemas.js';
import { parseBridgeEnv } from '../utils/env-parser.js';
import { conflictingAttachModesError } from '../utils/error-messages.js';
import { logger } from '../utils/logger.js';
import { useCallerHeaders } from './headers.js';

const log = logger.config;

/** Context used by requests that do not name one */
export const DEFAULT_CONTEXT_NAME = 'default';

export type AttachMode = 'launch' | 'cdp' | 'connect';

export interface ResourceConfigOptions extends BridgeSettingsInput {
  launchOptions?: LaunchOptions;
  /** Extra options for connectOverCDP; an endpointURL key is dropped */
  cdpOptions?: ConnectOverCDPOptions;
  /** Extra options for connect; a wsEndpoint key is dropped */
  connectOptions?: ConnectOptions;
  /** Contexts created when the fetcher starts, by name */
  startupContexts?: Record<string, ContextOptions>;
  /**
   * Header reconciliation policy. Leave undefined for useCallerHeaders,
   * pass null to send the browser's own headers unmodified.
   */
  processRequestHeaders?: HeaderPolicy | null;
  abortRequest?: AbortPredicate | null;
}

export class ResourceConfig {
  readonly browserType: BrowserTypeName;
  readonly launchOptions: Readonly<LaunchOptions>;
  readonly cdpUrl: string | null;
  readonly cdpOptions: Readonly<ConnectOverCDPOptions>;
  readonly connectUrl: string | null;
  readonly connectOptions: Readonly<ConnectOptions>;
  readonly maxPagesPerContext: number;
  /** null when the number of contexts is not bounded */
  readonly maxContexts: number | null;
  readonly startupContexts: Readonly<Record<string, ContextOptions>>;
  /** null leaves Playwright's default; 0 disables the timeout */
  readonly navigationTimeout: number | null;
  readonly processRequestHeaders: HeaderPolicy | null;
  readonly abortRequest: AbortPredicate | null;
  readonly restartDisconnectedBrowser: boolean;
  readonly targetClosedMaxRetries: number;
  readonly contentRetrievalRetries: number;

  private constructor(settings: BridgeSettings, options: ResourceConfigOptions) {
    this.browserType = settings.browserType;
    this.cdpUrl = settings.cdpUrl;
    this.cdpOptions = Object.freeze(withoutKey(options.cdpOptions ?? {}, 'endpointURL'));
    this.connectUrl = settings.connectUrl;
    this.connectOptions = Object.freeze(withoutKey(options.connectOptions ?? {}, 'wsEndpoint'));
    this.launchOptions = Object.freeze(
      settings.headless === undefined
        ? { ...options.launchOptions }
        : { headless: settings.headless, ...options.launchOptions }
    );
    this.maxPagesPerContext = settings.maxPagesPerContext || settings.concurrentRequests;
    this.maxContexts = settings.maxContexts || null;
    this.startupContexts = Object.freeze({ ...options.startupContexts });
    this.navigationTimeout = settings.navigationTimeout;
    this.processRequestHeaders =
      options.processRequestHeaders === undefined ? useCallerHeaders : options.processRequestHeaders;
    this.abortRequest = options.abortRequest ?? null;
    this.restartDisconnectedBrowser = settings.restartDisconnectedBrowser;
    this.targetClosedMaxRetries = settings.targetClosedMaxRetries;
    this.contentRetrievalRetries = settings.contentRetrievalRetries;

    Object.freeze(this);
  }

  /**
   * Validate programmatic options.
   *
   * @throws ConfigurationError when both a CDP URL and a connect URL are set
   * @throws ConfigValidationError when a setting is out of range
   */
  static fromOptions(options: ResourceConfigOptions = {}): ResourceConfig {
    if (options.cdpUrl && options.connectUrl) {
      const message = conflictingAttachModesError();
      log.error(message);
      throw new ConfigurationError(message, 'CONFIG_CONFLICTING_ATTACH_MODES');
    }

    const result = bridgeSettingsSchema.safeParse(options);
    if (!result.success) {
      throw new ConfigValidationError('browserBridge', result.error);
    }

    const settings = result.data;
    const launchOptions = options.launchOptions ?? {};
    if ((settings.cdpUrl || settings.connectUrl) && Object.keys(launchOptions).length > 0) {
      log.warn('Connecting to remote browser, ignoring launch options');
    }

    return new ResourceConfig(settings, options);
  }

  /**
   * Read the BROWSER_BRIDGE_* environment variables. Keys set in `overrides`
   * take precedence.
   */
  static fromEnv(
    overrides: ResourceConfigOptions = {},
    env: Record<string, string | undefined> = process.env
  ): ResourceConfig {
    return ResourceConfig.fromOptions({ ...parseBridgeEnv(env), ...overrides });
  }

  get attachMode(): AttachMode {
    if (this.cdpUrl) return 'cdp';
    if (this.connectUrl) return 'connect';
    return 'launch';
  }
}

function withoutKey<T extends object>(options: T, key: string): T {
  const copy = { ...options };
  Reflect.deleteProperty(copy, key);
  return copy;
}
