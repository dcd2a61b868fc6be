import { describe, it, expect } from 'vitest';
import {
  AxiosError,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';
import { CloudBrowserClient } from './cloud-browser-client.js';
import { ProvisioningError } from '../errors.js';

type Reply = { status: number; data: unknown } | { networkError: string };

function createAdapter(reply: Reply, requests: InternalAxiosRequestConfig[]): AxiosAdapter {
  return async (config) => {
    requests.push(config);

    if ('networkError' in reply) {
      throw new AxiosError(reply.networkError, 'ECONNREFUSED', config);
    }

    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
    if (reply.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        null,
        response,
      );
    }
    return response;
  };
}

function createClient(reply: Reply) {
  const requests: InternalAxiosRequestConfig[] = [];
  const client = new CloudBrowserClient({
    apiHost: 'https://browsers.test',
    apiToken: 'test-token',
    requestTimeoutMs: 60_000,
    adapter: createAdapter(reply, requests),
  });
  return { client, requests };
}

async function provisioningFailure(promise: Promise<unknown>): Promise<ProvisioningError> {
  const error = await promise.then(
    () => undefined,
    (reason: unknown) => reason,
  );
  if (!(error instanceof ProvisioningError)) {
    throw new Error('expected a ProvisioningError');
  }
  return error;
}

describe('CloudBrowserClient', () => {
  it('posts a one-time profile request with the API token', async () => {
    const { client, requests } = createClient({
      status: 200,
      data: { ws_url: 'ws://browsers.test/devtools/browser/abc' },
    });

    const session = await client.createOneTimeProfile({
      proxy: 'socks5://proxy.test:1080',
      browserSettings: { inactive_kill_timeout: 35 },
    });

    expect(session).toEqual({
      sessionId: 'ws://browsers.test/devtools/browser/abc',
      wsEndpoint: 'ws://browsers.test/devtools/browser/abc',
    });

    const [request] = requests;
    expect(request?.method).toBe('post');
    expect(request?.baseURL).toBe('https://browsers.test');
    expect(request?.url).toBe('/profiles/one_time');
    expect(request?.timeout).toBe(60_000);
    expect(request?.headers.get('x-cloud-api-token')).toBe('test-token');
    expect(JSON.parse(String(request?.data))).toEqual({
      proxy: 'socks5://proxy.test:1080',
      browser_settings: { inactive_kill_timeout: 35 },
    });
  });

  it('sends a null proxy and omits empty settings', async () => {
    const { client, requests } = createClient({
      status: 200,
      data: { ws_url: 'ws://browsers.test/devtools/browser/abc' },
    });

    await client.createOneTimeProfile({ proxy: null, fingerprint: {} });

    expect(JSON.parse(String(requests[0]?.data))).toEqual({ proxy: null });
  });

  it.each([
    [401, 'auth'],
    [403, 'auth'],
    [402, 'quota'],
    [429, 'quota'],
    [503, 'server'],
    [404, 'unexpected'],
  ])('maps HTTP %i to a %s provisioning error', async (status, kind) => {
    const { client } = createClient({ status, data: { detail: 'nope' } });

    const error = await provisioningFailure(client.createOneTimeProfile({ proxy: null }));

    expect(error.kind).toBe(kind);
    expect(error.status).toBe(status);
    expect(error.message).toBe(`Provisioning API responded with ${status}`);
    expect(error.retryable).toBe(true);
  });

  it('maps a missing response to a network error', async () => {
    const { client } = createClient({ networkError: 'connect ECONNREFUSED' });

    const error = await provisioningFailure(client.createOneTimeProfile({ proxy: null }));

    expect(error.kind).toBe('network');
    expect(error.status).toBeUndefined();
    expect(error.message).toBe('Provisioning API unreachable: connect ECONNREFUSED');
  });

  it('rejects a response without a ws_url', async () => {
    const { client } = createClient({ status: 200, data: { id: 'profile-1' } });

    const error = await provisioningFailure(client.createOneTimeProfile({ proxy: null }));

    expect(error.kind).toBe('invalid-response');
  });

  it('rejects with the abort reason when cancelled', async () => {
    const { client, requests } = createClient({
      status: 200,
      data: { ws_url: 'ws://browsers.test/devtools/browser/abc' },
    });
    const controller = new AbortController();
    const reason = new Error('pool shutting down');
    controller.abort(reason);

    await expect(client.createOneTimeProfile({ proxy: null }, controller.signal)).rejects.toBe(reason);
    expect(requests).toHaveLength(0);
  });
});
