import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';
import { createLogger } from '@workspace/logger';
import { ProvisioningError, abortReason, toError, type ProvisioningErrorKind } from '../errors.js';
import { proxyHost } from '../proxy/proxy-assigner.js';
import type { CreateSessionOptions, ProvisionedSession } from './types.js';

const API_TOKEN_HEADER = 'x-cloud-api-token';
const ONE_TIME_PROFILE_PATH = '/profiles/one_time';

const oneTimeProfileSchema = z.object({
  ws_url: z.string().url(),
});

type CloudBrowserClientOptions = {
  apiHost: string;
  apiToken: string;
  requestTimeoutMs: number;
  /** Replaces the HTTP transport; tests use it to answer in process. */
  adapter?: AxiosAdapter;
};

type OneTimeProfileRequest = {
  proxy: string | null;
  browser_settings?: Record<string, unknown>;
  fingerprint?: Record<string, unknown>;
};

const log = createLogger('cloud-browser-client');

function kindForStatus(status: number): ProvisioningErrorKind {
  if (status === 401 || status === 403) {
    return 'auth';
  }
  if (status === 402 || status === 429) {
    return 'quota';
  }
  if (status >= 500) {
    return 'server';
  }
  return 'unexpected';
}

/**
 * HTTP client for the provisioning API. Each call creates a one-time
 * browser profile and returns the CDP endpoint to connect to.
 */
export class CloudBrowserClient {
  private readonly http: AxiosInstance;
  private readonly apiToken: string;

  constructor(options: CloudBrowserClientOptions) {
    this.apiToken = options.apiToken;
    this.http = axios.create({
      baseURL: options.apiHost,
      timeout: options.requestTimeoutMs,
      headers: { 'Content-Type': 'application/json' },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async createOneTimeProfile(
    options: CreateSessionOptions,
    signal?: AbortSignal,
  ): Promise<ProvisionedSession> {
    const body: OneTimeProfileRequest = { proxy: options.proxy };
    if (options.browserSettings && Object.keys(options.browserSettings).length > 0) {
      body.browser_settings = options.browserSettings;
    }
    if (options.fingerprint && Object.keys(options.fingerprint).length > 0) {
      body.fingerprint = options.fingerprint;
    }

    let data: unknown;
    try {
      const response = await this.http.post<unknown>(ONE_TIME_PROFILE_PATH, body, {
        headers: { [API_TOKEN_HEADER]: this.apiToken },
        signal,
      });
      data = response.data;
    } catch (error) {
      throw this.toProvisioningError(error, signal);
    }

    const parsed = oneTimeProfileSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProvisioningError(
        'Provisioning API returned a response without a valid ws_url',
        'invalid-response',
        undefined,
        { cause: parsed.error },
      );
    }

    const wsEndpoint = parsed.data.ws_url;
    log.debug('One-time profile created', { proxy: proxyHost(options.proxy) });
    return { sessionId: wsEndpoint, wsEndpoint };
  }

  private toProvisioningError(error: unknown, signal: AbortSignal | undefined): Error {
    if (axios.isCancel(error) && signal?.aborted) {
      return abortReason(signal, 'Provisioning request aborted');
    }

    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      if (status !== undefined) {
        return new ProvisioningError(
          `Provisioning API responded with ${status}`,
          kindForStatus(status),
          status,
          { cause: error },
        );
      }
      return new ProvisioningError(
        `Provisioning API unreachable: ${error.message}`,
        'network',
        undefined,
        { cause: error },
      );
    }

    const cause = toError(error);
    return new ProvisioningError(`Provisioning request failed: ${cause.message}`, 'unexpected', undefined, {
      cause,
    });
  }
}

export type { CloudBrowserClientOptions, OneTimeProfileRequest };
