export { BrowserPool } from "./pool/browser-pool.js";
export {
  SessionHandle,
  InvalidSessionStateError,
  type SessionState,
  type SessionHandleInfo
} from "./pool/session-handle.js";
export { StartupGate, StartupPermit } from "./pool/startup-gate.js";
export type {
  AcquireOptions,
  ShutdownOptions,
  SlotFailure,
  WarmUpReport,
  PoolStats,
  PoolPhase,
  BrowserPoolDependencies
} from "./pool/types.js";
export {
  ProxyAssigner,
  proxyHost,
  type ProxyOrdering,
  type RandomSource,
  type ProxySource
} from "./proxy/proxy-assigner.js";
export {
  RequestDispatchExtension,
  createCloudBrowserExtension,
  type DispatchOptions,
  type RequestDispatchExtensionOptions,
  type CloudBrowserExtensionOverrides
} from "./extension/request-dispatch-extension.js";
export {
  CloudBrowserClient,
  type CloudBrowserClientOptions
} from "./provisioning/cloud-browser-client.js";
export { CloudBrowserProvider } from "./provisioning/cloud-browser-provider.js";
export type {
  OpaqueSettings,
  CreateSessionOptions,
  ProvisionedSession,
  HttpMethod,
  PageRequest,
  PageResponse,
  SessionProvider
} from "./provisioning/types.js";
export {
  RemoteBrowserDriver,
  type BrowserConnector,
  type RemoteBrowserDriverOptions
} from "./browser/remote-browser-driver.js";
export {
  DEFAULT_POOL_CONFIG,
  parsePoolConfig,
  parseSettings,
  toPoolConfig,
  loadSettings,
  loadSettingsFile,
  loadSettingsFromEnv,
  redactSettings,
  type PoolConfig,
  type PoolConfigInput,
  type CloudBrowserSettings
} from "./config/settings.js";
export { PoolMetrics, type PoolCounter, type PoolGauge, type PoolMetricSnapshot } from "./observability/pool-metrics.js";
export {
  CloudBrowserError,
  ConfigError,
  ProvisioningError,
  SessionBrokenError,
  FetchError,
  PoolShutDownError,
  TimeoutError,
  type ProvisioningErrorKind
} from "./errors.js";
