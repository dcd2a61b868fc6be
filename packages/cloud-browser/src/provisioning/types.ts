type OpaqueSettings = Record<string, unknown>;

type CreateSessionOptions = {
  proxy: string | null;
  browserSettings?: OpaqueSettings;
  fingerprint?: OpaqueSettings;
};

type ProvisionedSession = {
  sessionId: string;
  wsEndpoint: string;
};

type HttpMethod = 'GET' | 'OPTIONS' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

type PageRequest = {
  url: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
};

type PageResponse = {
  url: string;
  status: number;
  headers: Record<string, string>;
  body: Buffer;
};

/**
 * Remote side of the pool: provisions, drives and destroys browser sessions.
 * The pool only ever talks to this interface.
 */
interface SessionProvider {
  createSession(options: CreateSessionOptions, signal?: AbortSignal): Promise<ProvisionedSession>;
  destroySession(session: ProvisionedSession): Promise<void>;
  fetchPage(session: ProvisionedSession, request: PageRequest): Promise<PageResponse>;
  ping?(session: ProvisionedSession): Promise<void>;
}

export type {
  OpaqueSettings,
  CreateSessionOptions,
  ProvisionedSession,
  HttpMethod,
  PageRequest,
  PageResponse,
  SessionProvider,
};
