import type { Logger } from '@workspace/logger';
import type { PoolMetrics } from '../observability/pool-metrics.js';
import type { ProxyAssigner } from '../proxy/proxy-assigner.js';

type AcquireOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

type ShutdownOptions = {
  timeoutMs?: number;
};

type SlotFailure = {
  slotIndex: number;
  error: Error;
};

type WarmUpReport = {
  ready: number;
  failures: SlotFailure[];
};

type PoolStats = {
  slots: number;
  ready: number;
  busy: number;
  starting: number;
  empty: number;
  waiting: number;
  startsInFlight: number;
  startsQueued: number;
};

type PoolPhase = 'running' | 'shutting-down' | 'closed';

type BrowserPoolDependencies = {
  proxyAssigner?: ProxyAssigner;
  metrics?: PoolMetrics;
  logger?: Logger;
};

export type {
  AcquireOptions,
  ShutdownOptions,
  SlotFailure,
  WarmUpReport,
  PoolStats,
  PoolPhase,
  BrowserPoolDependencies,
};
