import { createLogger } from '@workspace/logger';
import { RemoteBrowserDriver } from '../browser/remote-browser-driver.js';
import { parseSettings, toPoolConfig } from '../config/settings.js';
import { PoolShutDownError, SessionBrokenError } from '../errors.js';
import { BrowserPool } from '../pool/browser-pool.js';
import type { ShutdownOptions, WarmUpReport } from '../pool/types.js';
import { CloudBrowserClient } from '../provisioning/cloud-browser-client.js';
import { CloudBrowserProvider } from '../provisioning/cloud-browser-provider.js';
import type { PageRequest, PageResponse, SessionProvider } from '../provisioning/types.js';

const SERVER_ERROR_STATUS = 500;

type DispatchOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

type RequestDispatchExtensionOptions = {
  /** Treat a 5xx page as a sign the browser (or its proxy) went bad. */
  recycleOnServerError?: boolean;
};

type CloudBrowserExtensionOverrides = RequestDispatchExtensionOptions & {
  provider?: SessionProvider;
};

const log = createLogger('request-dispatch');

/**
 * Connects a crawling pipeline to the pool: warm up on start, one pooled
 * session per request, shut down on stop.
 */
export class RequestDispatchExtension {
  readonly pool: BrowserPool;
  private readonly provider: SessionProvider;
  private readonly recycleOnServerError: boolean;

  constructor(
    pool: BrowserPool,
    provider: SessionProvider,
    options: RequestDispatchExtensionOptions = {},
  ) {
    this.pool = pool;
    this.provider = provider;
    this.recycleOnServerError = options.recycleOnServerError ?? true;
  }

  onStart(): Promise<WarmUpReport> {
    return this.pool.warmUp();
  }

  async fetch(request: PageRequest, options: DispatchOptions = {}): Promise<PageResponse> {
    const handle = await this.pool.acquireSession({
      timeoutMs: options.timeoutMs,
      signal: options.signal,
    });
    const startedAt = Date.now();

    let response: PageResponse;
    try {
      response = await this.provider.fetchPage(handle.session, request);
    } catch (error) {
      // shutdown killed the browser under us; the page must not be retried
      if (this.pool.isShuttingDown) {
        this.pool.releaseSession(handle, false);
        throw new PoolShutDownError(undefined, { cause: error });
      }

      const broken = error instanceof SessionBrokenError;
      this.pool.releaseSession(handle, false, broken);
      log.warn('Page fetch failed', {
        url: request.url,
        slotIndex: handle.slotIndex,
        sessionBroken: broken,
        err: error,
      });
      throw error;
    }

    if (this.pool.isShuttingDown && handle.currentState === 'dead') {
      throw new PoolShutDownError('Browser pool shut down while the page was being fetched');
    }

    const serverError = response.status >= SERVER_ERROR_STATUS;
    this.pool.releaseSession(handle, !serverError, serverError && this.recycleOnServerError);

    log.debug('Page fetched', {
      url: request.url,
      status: response.status,
      slotIndex: handle.slotIndex,
      durationMs: Date.now() - startedAt,
    });
    return response;
  }

  onStop(options?: ShutdownOptions): Promise<void> {
    return this.pool.shutdown(options);
  }
}

/**
 * Builds the extension from a raw `CLOUD_BROWSER` settings object.
 * Throws ConfigError when the settings are invalid.
 */
export function createCloudBrowserExtension(
  rawSettings: unknown,
  overrides: CloudBrowserExtensionOverrides = {},
): RequestDispatchExtension {
  const config = toPoolConfig(parseSettings(rawSettings));

  const provider =
    overrides.provider ??
    new CloudBrowserProvider(
      new CloudBrowserClient({
        apiHost: config.apiHost,
        apiToken: config.apiToken,
        requestTimeoutMs: config.requestTimeoutMs,
      }),
      new RemoteBrowserDriver({
        connectTimeoutMs: config.connectTimeoutMs,
        requestTimeoutMs: config.requestTimeoutMs,
      }),
    );

  return new RequestDispatchExtension(new BrowserPool(config, provider), provider, {
    recycleOnServerError: overrides.recycleOnServerError,
  });
}

export type { DispatchOptions, RequestDispatchExtensionOptions, CloudBrowserExtensionOverrides };
