import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { ProxySource } from '../proxy/proxy-assigner.js';

const DEFAULT_POOL_CONFIG = {
  numBrowsers: 1,
  pagesPerBrowser: 100,
  startSemaphores: 10,
  proxyOrdering: 'random',
  maxStartAttempts: 3,
  startRetryDelayMs: 500,
  shutdownTimeoutMs: 30_000,
  heartbeatIntervalMs: 5_000,
  recycleOnFailure: false,
  requestTimeoutMs: 60_000,
  connectTimeoutMs: 10_000,
} as const;

const proxyOrderingSchema = z.enum(['random', 'round-robin']);
const proxyListSchema = z.array(z.string().url()).default([]);
const proxySourceSchema = z.custom<ProxySource>((value) => typeof value === 'function', {
  message: 'Expected a list of proxy URLs or an async proxy source',
});
const opaqueSettingsSchema = z.record(z.string(), z.unknown());
const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const poolConfigSchema = z.object({
  apiHost: z.string().url(),
  apiToken: z.string().min(1),
  numBrowsers: positiveInt.default(DEFAULT_POOL_CONFIG.numBrowsers),
  /** A list, or a function asked for a fresh proxy on every session start. */
  proxies: z.union([z.array(z.string().url()), proxySourceSchema]).default([]),
  pagesPerBrowser: positiveInt.default(DEFAULT_POOL_CONFIG.pagesPerBrowser),
  startSemaphores: positiveInt.default(DEFAULT_POOL_CONFIG.startSemaphores),
  proxyOrdering: proxyOrderingSchema.default(DEFAULT_POOL_CONFIG.proxyOrdering),
  browserSettings: opaqueSettingsSchema.optional(),
  fingerprint: opaqueSettingsSchema.optional(),
  maxStartAttempts: positiveInt.default(DEFAULT_POOL_CONFIG.maxStartAttempts),
  startRetryDelayMs: nonNegativeInt.default(DEFAULT_POOL_CONFIG.startRetryDelayMs),
  shutdownTimeoutMs: positiveInt.default(DEFAULT_POOL_CONFIG.shutdownTimeoutMs),
  heartbeatIntervalMs: nonNegativeInt.default(DEFAULT_POOL_CONFIG.heartbeatIntervalMs),
  recycleOnFailure: z.boolean().default(DEFAULT_POOL_CONFIG.recycleOnFailure),
  requestTimeoutMs: positiveInt.default(DEFAULT_POOL_CONFIG.requestTimeoutMs),
  connectTimeoutMs: positiveInt.default(DEFAULT_POOL_CONFIG.connectTimeoutMs),
});

/**
 * The `CLOUD_BROWSER` settings namespace, keyed the way operators write it.
 */
const cloudBrowserSettingsSchema = z.object({
  API_HOST: poolConfigSchema.shape.apiHost,
  API_TOKEN: poolConfigSchema.shape.apiToken,
  NUM_BROWSERS: poolConfigSchema.shape.numBrowsers,
  PROXIES: proxyListSchema,
  PAGES_PER_BROWSER: poolConfigSchema.shape.pagesPerBrowser,
  START_SEMAPHORES: poolConfigSchema.shape.startSemaphores,
  PROXY_ORDERING: poolConfigSchema.shape.proxyOrdering,
  BROWSER_SETTINGS: poolConfigSchema.shape.browserSettings,
  FINGERPRINT: poolConfigSchema.shape.fingerprint,
  MAX_START_ATTEMPTS: poolConfigSchema.shape.maxStartAttempts,
  START_RETRY_DELAY_MS: poolConfigSchema.shape.startRetryDelayMs,
  SHUTDOWN_TIMEOUT_MS: poolConfigSchema.shape.shutdownTimeoutMs,
  HEARTBEAT_INTERVAL_MS: poolConfigSchema.shape.heartbeatIntervalMs,
  RECYCLE_ON_FAILURE: poolConfigSchema.shape.recycleOnFailure,
  REQUEST_TIMEOUT_MS: poolConfigSchema.shape.requestTimeoutMs,
  CONNECT_TIMEOUT_MS: poolConfigSchema.shape.connectTimeoutMs,
});

type PoolConfig = z.output<typeof poolConfigSchema>;
type PoolConfigInput = z.input<typeof poolConfigSchema>;
type ProxyOrderingSetting = z.infer<typeof proxyOrderingSchema>;
type CloudBrowserSettings = z.output<typeof cloudBrowserSettingsSchema>;
type SettingKey = keyof CloudBrowserSettings;

const SETTING_KEYS: readonly SettingKey[] = cloudBrowserSettingsSchema.keyof().options;

const INTEGER_KEYS: ReadonlySet<SettingKey> = new Set([
  'NUM_BROWSERS',
  'PAGES_PER_BROWSER',
  'START_SEMAPHORES',
  'MAX_START_ATTEMPTS',
  'START_RETRY_DELAY_MS',
  'SHUTDOWN_TIMEOUT_MS',
  'HEARTBEAT_INTERVAL_MS',
  'REQUEST_TIMEOUT_MS',
  'CONNECT_TIMEOUT_MS',
]);

const JSON_KEYS: ReadonlySet<SettingKey> = new Set(['BROWSER_SETTINGS', 'FINGERPRINT']);

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

function parsePoolConfig(input: PoolConfigInput): PoolConfig {
  const parsed = poolConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error), { cause: parsed.error });
  }
  return parsed.data;
}

function parseSettings(raw: unknown): CloudBrowserSettings {
  const parsed = cloudBrowserSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error), { cause: parsed.error });
  }
  return parsed.data;
}

function toPoolConfig(settings: CloudBrowserSettings): PoolConfig {
  return {
    apiHost: settings.API_HOST,
    apiToken: settings.API_TOKEN,
    numBrowsers: settings.NUM_BROWSERS,
    proxies: settings.PROXIES,
    pagesPerBrowser: settings.PAGES_PER_BROWSER,
    startSemaphores: settings.START_SEMAPHORES,
    proxyOrdering: settings.PROXY_ORDERING,
    browserSettings: settings.BROWSER_SETTINGS,
    fingerprint: settings.FINGERPRINT,
    maxStartAttempts: settings.MAX_START_ATTEMPTS,
    startRetryDelayMs: settings.START_RETRY_DELAY_MS,
    shutdownTimeoutMs: settings.SHUTDOWN_TIMEOUT_MS,
    heartbeatIntervalMs: settings.HEARTBEAT_INTERVAL_MS,
    recycleOnFailure: settings.RECYCLE_ON_FAILURE,
    requestTimeoutMs: settings.REQUEST_TIMEOUT_MS,
    connectTimeoutMs: settings.CONNECT_TIMEOUT_MS,
  };
}

function coerceEnvValue(key: SettingKey, value: string): unknown {
  if (INTEGER_KEYS.has(key)) {
    return value.trim() === '' ? value : Number(value);
  }

  if (key === 'PROXIES') {
    return value
      .split(',')
      .map((proxy) => proxy.trim())
      .filter((proxy) => proxy.length > 0);
  }

  if (key === 'RECYCLE_ON_FAILURE') {
    if (value === 'true') return true;
    if (value === 'false') return false;
    return value;
  }

  if (JSON_KEYS.has(key)) {
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch (error) {
      throw new ConfigError([`${key}: must be a JSON object`], { cause: error });
    }
  }

  return value;
}

/**
 * Reads `CLOUD_BROWSER_<KEY>` variables. PROXIES is comma-separated,
 * BROWSER_SETTINGS and FINGERPRINT hold JSON.
 */
function loadSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): CloudBrowserSettings {
  const raw: Record<string, unknown> = {};

  for (const key of SETTING_KEYS) {
    const value = env[`CLOUD_BROWSER_${key}`];
    if (value !== undefined) {
      raw[key] = coerceEnvValue(key, value);
    }
  }

  return parseSettings(raw);
}

async function readJsonFile(path: string): Promise<unknown> {
  try {
    const document: unknown = JSON.parse(await readFile(path, 'utf8'));
    return document;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`${path}: ${reason}`], { cause: error });
  }
}

/**
 * Reads a JSON file holding either `{ "CLOUD_BROWSER": { ... } }` or the
 * namespace object itself.
 */
async function loadSettingsFile(path: string): Promise<CloudBrowserSettings> {
  const document = await readJsonFile(path);

  if (typeof document === 'object' && document !== null && 'CLOUD_BROWSER' in document) {
    return parseSettings(document.CLOUD_BROWSER);
  }
  return parseSettings(document);
}

/**
 * Settings file when a path is given, `CLOUD_BROWSER_*` variables otherwise.
 */
async function loadSettings(configPath?: string): Promise<CloudBrowserSettings> {
  return configPath ? loadSettingsFile(configPath) : loadSettingsFromEnv();
}

function redactSettings(settings: CloudBrowserSettings): CloudBrowserSettings {
  return { ...settings, API_TOKEN: '[redacted]' };
}

export {
  DEFAULT_POOL_CONFIG,
  poolConfigSchema,
  cloudBrowserSettingsSchema,
  parsePoolConfig,
  parseSettings,
  toPoolConfig,
  loadSettingsFromEnv,
  loadSettingsFile,
  loadSettings,
  redactSettings,
};
export type {
  PoolConfig,
  PoolConfigInput,
  ProxyOrderingSetting,
  CloudBrowserSettings,
};
