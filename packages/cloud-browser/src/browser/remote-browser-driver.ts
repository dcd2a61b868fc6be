import puppeteer, {
  type Browser,
  type ContinueRequestOverrides,
  type HTTPRequest,
  type Page,
} from 'puppeteer-core';
import { TargetCloseError } from 'puppeteer-core/internal/common/Errors.js';
import { createLogger } from '@workspace/logger';
import {
  FetchError,
  ProvisioningError,
  SessionBrokenError,
  TimeoutError,
  toError,
} from '../errors.js';
import type { PageRequest, PageResponse, ProvisionedSession } from '../provisioning/types.js';

type BrowserConnector = (wsEndpoint: string) => Promise<Browser>;

type RemoteBrowserDriverOptions = {
  connectTimeoutMs: number;
  requestTimeoutMs: number;
  connector?: BrowserConnector;
};

const CLOSED_SESSION_PATTERN = /target closed|session closed|connection closed|browser has disconnected/i;
const STRIPPED_RESPONSE_HEADERS = new Set(['content-encoding']);

const log = createLogger('remote-browser-driver');

const connectOverCdp: BrowserConnector = (wsEndpoint) =>
  puppeteer.connect({ browserWSEndpoint: wsEndpoint, defaultViewport: null });

async function withDeadline<T>(
  operation: string,
  timeoutMs: number,
  task: Promise<T>,
  onLate: (value: T) => void,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  let expired = false;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      expired = true;
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  const guarded = task.then((value) => {
    if (expired) {
      onLate(value);
    }
    return value;
  });

  try {
    return await Promise.race([guarded, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

function buildOverrides(request: PageRequest): ContinueRequestOverrides | undefined {
  const method = request.method ?? 'GET';
  const hasHeaders = request.headers !== undefined && Object.keys(request.headers).length > 0;
  if (method === 'GET' && !hasHeaders && request.body === undefined) {
    return undefined;
  }

  return {
    method,
    ...(hasHeaders ? { headers: request.headers } : {}),
    ...(request.body !== undefined ? { postData: request.body } : {}),
  };
}

function stripHeaders(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (!STRIPPED_RESPONSE_HEADERS.has(name.toLowerCase())) {
      result[name] = value;
    }
  }
  return result;
}

/**
 * Drives remote browsers over CDP. One puppeteer connection is kept per
 * provisioned session; every fetch runs in a fresh tab that is closed
 * afterwards.
 */
export class RemoteBrowserDriver {
  private readonly connectTimeoutMs: number;
  private readonly requestTimeoutMs: number;
  private readonly connector: BrowserConnector;
  private readonly browsers: Map<string, Browser>;

  constructor(options: RemoteBrowserDriverOptions) {
    this.connectTimeoutMs = options.connectTimeoutMs;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.connector = options.connector ?? connectOverCdp;
    this.browsers = new Map();
  }

  /**
   * Opens the CDP connection and checks it answers `Browser.getVersion`.
   */
  async connect(session: ProvisionedSession): Promise<void> {
    let browser: Browser;
    try {
      browser = await withDeadline(
        'Browser connection',
        this.connectTimeoutMs,
        this.connector(session.wsEndpoint),
        (late) => this.disconnectQuietly(late, session.sessionId),
      );
    } catch (error) {
      throw new ProvisioningError(
        `Could not connect to remote browser: ${toError(error).message}`,
        'network',
        undefined,
        { cause: error },
      );
    }

    try {
      await withDeadline('Browser ping', this.connectTimeoutMs, browser.version(), () => {});
    } catch (error) {
      this.disconnectQuietly(browser, session.sessionId);
      throw new ProvisioningError(
        `Remote browser did not answer: ${toError(error).message}`,
        'network',
        undefined,
        { cause: error },
      );
    }

    browser.on('disconnected', () => {
      if (this.browsers.get(session.sessionId) === browser) {
        this.browsers.delete(session.sessionId);
        log.debug('Remote browser disconnected', { sessionId: session.sessionId });
      }
    });
    this.browsers.set(session.sessionId, browser);
  }

  async ping(session: ProvisionedSession): Promise<void> {
    const browser = this.requireBrowser(session);
    try {
      await withDeadline('Browser ping', this.connectTimeoutMs, browser.version(), () => {});
    } catch (error) {
      throw new SessionBrokenError(session.sessionId, 'ping failed', { cause: error });
    }
  }

  async fetch(session: ProvisionedSession, request: PageRequest): Promise<PageResponse> {
    const browser = this.requireBrowser(session);
    const timeout = request.timeoutMs ?? this.requestTimeoutMs;

    let page: Page;
    try {
      page = await browser.newPage();
    } catch (error) {
      throw this.classify(session, browser, request.url, error);
    }

    try {
      const overrides = buildOverrides(request);
      if (overrides) {
        let applied = false;
        await page.setRequestInterception(true);
        page.on('request', (intercepted: HTTPRequest) => {
          const isTarget = !applied && intercepted.isNavigationRequest();
          if (isTarget) {
            applied = true;
          }
          intercepted.continue(isTarget ? overrides : {}).catch((error: unknown) => {
            log.debug('Intercepted request could not be continued', {
              url: intercepted.url(),
              err: toError(error),
            });
          });
        });
      }

      const response = await page.goto(request.url, { waitUntil: 'load', timeout });
      if (!response) {
        throw new FetchError(request.url, 'navigation produced no response');
      }

      return {
        url: response.url(),
        status: response.status(),
        headers: stripHeaders(response.headers()),
        body: await response.buffer(),
      };
    } catch (error) {
      throw this.classify(session, browser, request.url, error);
    } finally {
      await page.close().catch((error: unknown) => {
        log.debug('Failed to close page', { sessionId: session.sessionId, err: toError(error) });
      });
    }
  }

  async close(session: ProvisionedSession): Promise<void> {
    const browser = this.browsers.get(session.sessionId);
    if (!browser) {
      return;
    }

    this.browsers.delete(session.sessionId);
    await browser.close();
  }

  get openSessions(): number {
    return this.browsers.size;
  }

  private requireBrowser(session: ProvisionedSession): Browser {
    const browser = this.browsers.get(session.sessionId);
    if (!browser || !browser.connected) {
      throw new SessionBrokenError(session.sessionId, 'browser is not connected');
    }
    return browser;
  }

  private classify(session: ProvisionedSession, browser: Browser, url: string, error: unknown): Error {
    if (error instanceof FetchError || error instanceof SessionBrokenError) {
      return error;
    }

    const cause = toError(error);
    if (
      !browser.connected ||
      error instanceof TargetCloseError ||
      CLOSED_SESSION_PATTERN.test(cause.message)
    ) {
      return new SessionBrokenError(session.sessionId, cause.message, { cause });
    }
    return new FetchError(url, cause.message, { cause });
  }

  private disconnectQuietly(browser: Browser, sessionId: string): void {
    browser.disconnect().catch((error: unknown) => {
      log.debug('Failed to drop remote browser connection', { sessionId, err: toError(error) });
    });
  }
}

export type { BrowserConnector, RemoteBrowserDriverOptions };
