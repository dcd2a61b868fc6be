import { createLogger } from '@workspace/logger';
import type { RemoteBrowserDriver } from '../browser/remote-browser-driver.js';
import { abortReason } from '../errors.js';
import { proxyHost } from '../proxy/proxy-assigner.js';
import type { CloudBrowserClient } from './cloud-browser-client.js';
import type {
  CreateSessionOptions,
  PageRequest,
  PageResponse,
  ProvisionedSession,
  SessionProvider,
} from './types.js';

const log = createLogger('cloud-browser-provider');

/**
 * SessionProvider backed by the provisioning API and a CDP driver.
 */
export class CloudBrowserProvider implements SessionProvider {
  private readonly client: CloudBrowserClient;
  private readonly driver: RemoteBrowserDriver;

  constructor(client: CloudBrowserClient, driver: RemoteBrowserDriver) {
    this.client = client;
    this.driver = driver;
  }

  async createSession(
    options: CreateSessionOptions,
    signal?: AbortSignal,
  ): Promise<ProvisionedSession> {
    const session = await this.client.createOneTimeProfile(options, signal);
    await this.driver.connect(session);

    // the pool may have started shutting down while we were connecting
    if (signal?.aborted) {
      await this.destroySession(session);
      throw abortReason(signal, 'Session creation aborted');
    }

    log.debug('Remote browser connected', {
      sessionId: session.sessionId,
      proxy: proxyHost(options.proxy),
    });
    return session;
  }

  async destroySession(session: ProvisionedSession): Promise<void> {
    await this.driver.close(session);
  }

  fetchPage(session: ProvisionedSession, request: PageRequest): Promise<PageResponse> {
    return this.driver.fetch(session, request);
  }

  ping(session: ProvisionedSession): Promise<void> {
    return this.driver.ping(session);
  }
}
