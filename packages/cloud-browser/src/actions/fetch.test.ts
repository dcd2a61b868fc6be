import { describe, it, expect } from 'vitest';
import { fetchAll, fetchArgsSchema } from './fetch.js';
import { BrowserPool } from '../pool/browser-pool.js';
import { RequestDispatchExtension } from '../extension/request-dispatch-extension.js';
import { FetchError } from '../errors.js';
import { FakeSessionProvider } from '../testing/fake-session-provider.js';

describe('fetchArgsSchema', () => {
  it('splits and trims the URL list', () => {
    const parsed = fetchArgsSchema.parse({
      urls: 'https://a.test/, https://b.test/,',
      timeoutMs: '500',
    });

    expect(parsed).toEqual({
      urls: ['https://a.test/', 'https://b.test/'],
      timeoutMs: 500,
      pretty: false,
    });
  });

  it.each([
    [{}, 'Missing required option: --urls'],
    [{ urls: ' , ' }, 'Missing required option: --urls'],
    [{ urls: 'not-a-url' }, 'Invalid --urls. Every entry must be an absolute URL.'],
    [{ urls: 'https://a.test/', timeoutMs: '0' }, 'Invalid --timeoutMs. Must be a positive integer.'],
  ])('rejects %j', (options, message) => {
    const parsed = fetchArgsSchema.safeParse(options);

    expect(parsed.success).toBe(false);
    expect(parsed.error?.issues[0]?.message).toBe(message);
  });
});

describe('fetchAll', () => {
  it('reports each URL on its own', async () => {
    const provider = new FakeSessionProvider();
    provider.fetchHandler = async (_session, request) => {
      if (request.url.includes('broken')) {
        throw new FetchError(request.url, 'net::ERR_FAILED');
      }
      return { url: request.url, status: 200, headers: {}, body: Buffer.from('<html></html>') };
    };
    const pool = new BrowserPool(
      { apiHost: 'https://browsers.test', apiToken: 'test-token', heartbeatIntervalMs: 0 },
      provider,
    );
    const extension = new RequestDispatchExtension(pool, provider);
    await extension.onStart();

    const results = await fetchAll(extension, ['https://ok.test/', 'https://broken.test/']);

    expect(results).toEqual([
      { url: 'https://ok.test/', ok: true, status: 200, finalUrl: 'https://ok.test/', bytes: 13 },
      {
        url: 'https://broken.test/',
        ok: false,
        error: 'Failed to fetch https://broken.test/: net::ERR_FAILED',
        retryable: true,
      },
    ]);
    await extension.onStop();
  });
});
