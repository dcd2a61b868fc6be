import { createLogger, type Logger } from '@workspace/logger';
import { parsePoolConfig, type PoolConfig, type PoolConfigInput } from '../config/settings.js';
import { PoolShutDownError, TimeoutError, abortReason, toError } from '../errors.js';
import { PoolMetrics } from '../observability/pool-metrics.js';
import { ProxyAssigner } from '../proxy/proxy-assigner.js';
import type { ProvisionedSession, SessionProvider } from '../provisioning/types.js';
import { InvalidSessionStateError, SessionHandle, type SessionHandleInfo } from './session-handle.js';
import { StartupGate, type StartupPermit } from './startup-gate.js';
import type {
  AcquireOptions,
  BrowserPoolDependencies,
  PoolPhase,
  PoolStats,
  ShutdownOptions,
  SlotFailure,
  WarmUpReport,
} from './types.js';

type SlotOutcome = { ok: true; handle: SessionHandle } | { ok: false; error: Error };

/**
 * A stable position in the pool. The handle occupying it changes on every
 * recycling; `task` is set while a provisioning attempt for it is underway.
 */
type Slot = {
  readonly index: number;
  handle: SessionHandle | undefined;
  task: Promise<SlotOutcome> | undefined;
  failures: number;
  retryTimer: NodeJS.Timeout | undefined;
};

type Waiter = {
  resolve: (handle: SessionHandle) => void;
  reject: (error: Error) => void;
};

/**
 * Bounded pool of remote browser sessions.
 *
 * All slot-table mutations happen in synchronous sections between awaits,
 * so the event loop is the pool's lock; provisioning, teardown and page
 * fetches run outside of them.
 */
export class BrowserPool {
  readonly config: PoolConfig;
  private readonly provider: SessionProvider;
  private readonly gate: StartupGate;
  private readonly proxyAssigner: ProxyAssigner;
  private readonly metrics: PoolMetrics;
  private readonly log: Logger;
  private readonly slots: Slot[];
  private readonly waiters: Waiter[];
  private readonly teardowns: Set<Promise<void>>;
  private readonly lifecycle: AbortController;
  private phase: PoolPhase;
  private warmUpResult: Promise<WarmUpReport> | undefined;
  private shutdownResult: Promise<void> | undefined;
  private heartbeatTimer: NodeJS.Timeout | undefined;
  private heartbeatRunning: boolean;

  constructor(
    config: PoolConfigInput,
    provider: SessionProvider,
    dependencies: BrowserPoolDependencies = {},
  ) {
    this.config = parsePoolConfig(config);
    this.provider = provider;
    this.gate = new StartupGate(this.config.startSemaphores);
    this.proxyAssigner =
      dependencies.proxyAssigner ??
      new ProxyAssigner(this.config.proxies, this.config.proxyOrdering);
    this.metrics = dependencies.metrics ?? new PoolMetrics();
    this.log = dependencies.logger ?? createLogger('browser-pool');
    this.slots = Array.from({ length: this.config.numBrowsers }, (_, index) => ({
      index,
      handle: undefined,
      task: undefined,
      failures: 0,
      retryTimer: undefined,
    }));
    this.waiters = [];
    this.teardowns = new Set();
    this.lifecycle = new AbortController();
    this.phase = 'running';
    this.warmUpResult = undefined;
    this.shutdownResult = undefined;
    this.heartbeatTimer = undefined;
    this.heartbeatRunning = false;
  }

  /**
   * Provisions every slot concurrently and resolves once each one is ready
   * or has failed. Later calls return the first call's report.
   */
  warmUp(): Promise<WarmUpReport> {
    if (this.isShuttingDown) {
      return Promise.reject(new PoolShutDownError());
    }

    if (!this.warmUpResult) {
      this.warmUpResult = this.runWarmUp();
    }
    return this.warmUpResult;
  }

  acquireSession(options: AcquireOptions = {}): Promise<SessionHandle> {
    if (this.isShuttingDown) {
      return Promise.reject(new PoolShutDownError());
    }

    if (options.signal?.aborted) {
      return Promise.reject(abortReason(options.signal, 'Session acquisition aborted'));
    }

    const handle = this.takeReady();
    if (handle) {
      return Promise.resolve(handle);
    }

    this.refillEmptySlots();
    return this.enqueueWaiter(options);
  }

  /**
   * Hands a busy handle back. Counts the page when it succeeded, then either
   * makes the handle available again or recycles its slot.
   */
  releaseSession(handle: SessionHandle, pageSucceeded: boolean, sessionBroken = false): void {
    const state = handle.currentState;
    if (state === 'dead') {
      return;
    }
    if (state !== 'busy') {
      throw new InvalidSessionStateError('release', state);
    }

    const slot = this.slots[handle.slotIndex];
    if (!slot || slot.handle !== handle) {
      throw new Error(`Session handle for slot ${handle.slotIndex} does not belong to this pool`);
    }

    if (pageSucceeded) {
      handle.recordPage();
      this.metrics.increment('pages.served');
    } else {
      this.metrics.increment('pages.failed');
    }

    const reason = this.recycleReason(handle, pageSucceeded, sessionBroken);
    if (reason) {
      this.recycle(slot, handle, reason);
      return;
    }

    handle.markIdle();
    this.dispatch();
  }

  shutdown(options: ShutdownOptions = {}): Promise<void> {
    if (!this.shutdownResult) {
      this.shutdownResult = this.runShutdown(options.timeoutMs ?? this.config.shutdownTimeoutMs);
    }
    return this.shutdownResult;
  }

  /**
   * Pings every provisioned session once. Ready sessions that fail are
   * recycled now; busy ones are recycled when released.
   */
  async checkLiveness(): Promise<void> {
    const provider = this.provider;
    const ping = provider.ping?.bind(provider);
    if (!ping || this.heartbeatRunning || this.isShuttingDown) {
      return;
    }

    this.heartbeatRunning = true;
    try {
      const targets = this.slots.flatMap((slot) => {
        const handle = slot.handle;
        const state = handle?.currentState;
        return handle && (state === 'ready' || state === 'busy') ? [handle] : [];
      });

      await Promise.all(
        targets.map(async (handle) => {
          try {
            await ping(handle.session);
          } catch (error) {
            this.onHeartbeatFailed(handle, toError(error));
          }
        }),
      );
    } finally {
      this.heartbeatRunning = false;
    }
  }

  getStats(): PoolStats {
    let ready = 0;
    let busy = 0;
    let starting = 0;
    let empty = 0;

    for (const slot of this.slots) {
      switch (slot.handle?.currentState) {
        case 'ready':
          ready += 1;
          break;
        case 'busy':
          busy += 1;
          break;
        case 'starting':
          starting += 1;
          break;
        default:
          empty += 1;
      }
    }

    return {
      slots: this.slots.length,
      ready,
      busy,
      starting,
      empty,
      waiting: this.waiters.length,
      startsInFlight: this.gate.inFlight,
      startsQueued: this.gate.pending,
    };
  }

  getHandles(): SessionHandleInfo[] {
    return this.slots.flatMap((slot) => (slot.handle ? [slot.handle.info] : []));
  }

  get isShuttingDown(): boolean {
    return this.phase !== 'running';
  }

  get currentPhase(): PoolPhase {
    return this.phase;
  }

  private async runWarmUp(): Promise<WarmUpReport> {
    this.log.info('Warming up browser pool', {
      numBrowsers: this.config.numBrowsers,
      startSemaphores: this.config.startSemaphores,
      proxies: this.proxyAssigner.dynamic ? 'source' : this.proxyAssigner.size,
    });

    const outcomes = await Promise.all(this.slots.map((slot) => this.fillSlot(slot)));

    let ready = 0;
    const failures: SlotFailure[] = [];
    outcomes.forEach((outcome, slotIndex) => {
      if (outcome.ok) {
        ready += 1;
      } else {
        failures.push({ slotIndex, error: outcome.error });
      }
    });

    if (failures.length > 0) {
      this.log.warn('Browser pool warmed up with failed slots', { ready, failed: failures.length });
    } else {
      this.log.info('Browser pool warmed up', { ready });
    }

    return { ready, failures };
  }

  private fillSlot(slot: Slot): Promise<SlotOutcome> {
    if (slot.task) {
      return slot.task;
    }
    if (slot.handle) {
      const outcome: SlotOutcome = { ok: true, handle: slot.handle };
      return Promise.resolve(outcome);
    }
    return this.startSlot(slot);
  }

  private startSlot(slot: Slot): Promise<SlotOutcome> {
    this.clearRetry(slot);
    this.startHeartbeat();

    const task = this.createHandle(slot);
    slot.task = task;
    return task;
  }

  /**
   * Never rejects: failures are reported through the outcome so background
   * refills cannot leave unhandled rejections behind.
   */
  private async createHandle(slot: Slot): Promise<SlotOutcome> {
    let permit: StartupPermit;
    try {
      permit = await this.gate.acquire(this.lifecycle.signal);
    } catch (error) {
      slot.task = undefined;
      return { ok: false, error: toError(error) };
    }

    let proxy: string | null;
    try {
      proxy = await this.proxyAssigner.next(slot.index);
    } catch (error) {
      this.gate.release(permit);
      return this.onStartFailed(slot, undefined, toError(error));
    }

    if (this.isShuttingDown) {
      this.gate.release(permit);
      return this.onStartFailed(slot, undefined, new PoolShutDownError());
    }

    const handle = new SessionHandle(slot.index, proxy);
    slot.handle = handle;
    const startedAt = performance.now();

    let session: ProvisionedSession;
    try {
      session = await this.provider.createSession(
        {
          proxy,
          browserSettings: this.config.browserSettings,
          fingerprint: this.config.fingerprint,
        },
        this.lifecycle.signal,
      );
    } catch (error) {
      this.gate.release(permit);
      return this.onStartFailed(slot, handle, toError(error));
    }

    this.gate.release(permit);
    this.metrics.recordProvisioning(performance.now() - startedAt);
    return this.onStarted(slot, handle, session);
  }

  private async onStarted(
    slot: Slot,
    handle: SessionHandle,
    session: ProvisionedSession,
  ): Promise<SlotOutcome> {
    slot.task = undefined;

    if (this.isShuttingDown) {
      handle.markDead();
      if (slot.handle === handle) {
        slot.handle = undefined;
      }
      await this.destroy(session, slot.index);
      return { ok: false, error: new PoolShutDownError() };
    }

    handle.markReady(session);
    slot.failures = 0;
    this.metrics.increment('sessions.created');
    this.log.debug('Browser session ready', {
      slotIndex: slot.index,
      sessionId: session.sessionId,
    });

    this.dispatch();
    return { ok: true, handle };
  }

  private onStartFailed(slot: Slot, handle: SessionHandle | undefined, error: Error): SlotOutcome {
    slot.task = undefined;
    if (handle) {
      handle.markDead();
      if (slot.handle === handle) {
        slot.handle = undefined;
      }
    }

    if (this.isShuttingDown) {
      return { ok: false, error };
    }

    slot.failures += 1;
    this.metrics.increment('provisioning.failed');
    this.log.error('Browser session provisioning failed', {
      slotIndex: slot.index,
      attempt: slot.failures,
      err: error,
    });

    if (this.waiters.length > 0) {
      if (slot.failures < this.config.maxStartAttempts) {
        this.scheduleRetry(slot);
      } else if (!this.canProgress()) {
        this.rejectWaiters(error);
      }
    }

    return { ok: false, error };
  }

  private scheduleRetry(slot: Slot): void {
    slot.retryTimer = setTimeout(() => {
      slot.retryTimer = undefined;
      if (this.isShuttingDown || slot.handle || slot.task || this.waiters.length === 0) {
        return;
      }
      void this.startSlot(slot);
    }, this.config.startRetryDelayMs);
  }

  private clearRetry(slot: Slot): void {
    if (slot.retryTimer) {
      clearTimeout(slot.retryTimer);
      slot.retryTimer = undefined;
    }
  }

  /**
   * Starts provisioning for every empty, idle slot. A slot that ran out of
   * start attempts gets a fresh budget: a new caller is a new retry.
   */
  private refillEmptySlots(): void {
    for (const slot of this.slots) {
      if (slot.handle || slot.task || slot.retryTimer) {
        continue;
      }
      if (slot.failures >= this.config.maxStartAttempts) {
        slot.failures = 0;
      }
      void this.startSlot(slot);
    }
  }

  private canProgress(): boolean {
    return this.slots.some(
      (slot) =>
        slot.handle !== undefined || slot.task !== undefined || slot.retryTimer !== undefined,
    );
  }

  private takeReady(): SessionHandle | undefined {
    for (const slot of this.slots) {
      const handle = slot.handle;
      if (!handle || handle.currentState !== 'ready') {
        continue;
      }
      if (!handle.alive) {
        this.recycle(slot, handle, 'heartbeat failed');
        continue;
      }

      handle.markBusy();
      return handle;
    }
    return undefined;
  }

  /**
   * Hands ready handles to waiters in arrival order.
   */
  private dispatch(): void {
    while (this.waiters.length > 0) {
      const handle = this.takeReady();
      if (!handle) {
        break;
      }

      const waiter = this.waiters.shift();
      if (!waiter) {
        handle.markIdle();
        break;
      }
      waiter.resolve(handle);
    }

    this.publishGauges();
  }

  private publishGauges(): void {
    const stats = this.getStats();
    this.metrics.gauge('sessions.ready', stats.ready);
    this.metrics.gauge('sessions.busy', stats.busy);
  }

  private enqueueWaiter(options: AcquireOptions): Promise<SessionHandle> {
    const { timeoutMs, signal } = options;

    return new Promise<SessionHandle>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      let detach = () => {};

      const settle = () => {
        clearTimeout(timer);
        detach();
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        this.metrics.gauge('acquire.waiting', this.waiters.length);
      };

      const waiter: Waiter = {
        resolve: (handle) => {
          settle();
          resolve(handle);
        },
        reject: (error) => {
          settle();
          reject(error);
        },
      };

      this.waiters.push(waiter);
      this.metrics.gauge('acquire.waiting', this.waiters.length);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.metrics.increment('acquire.timeout');
          waiter.reject(new TimeoutError('Session acquisition', timeoutMs));
        }, timeoutMs);
      }

      if (signal) {
        const onAbort = () => {
          waiter.reject(abortReason(signal, 'Session acquisition aborted'));
        };
        signal.addEventListener('abort', onAbort, { once: true });
        detach = () => signal.removeEventListener('abort', onAbort);
      }
    });
  }

  private rejectWaiters(error: Error): void {
    const pending = this.waiters.splice(0, this.waiters.length);
    for (const waiter of pending) {
      waiter.reject(error);
    }
  }

  private recycleReason(
    handle: SessionHandle,
    pageSucceeded: boolean,
    sessionBroken: boolean,
  ): string | undefined {
    if (sessionBroken) {
      return 'session broken';
    }
    if (!pageSucceeded && this.config.recycleOnFailure) {
      return 'page failed';
    }
    if (handle.isExhausted(this.config.pagesPerBrowser)) {
      return 'page budget reached';
    }
    if (!handle.alive) {
      return 'heartbeat failed';
    }
    return undefined;
  }

  private recycle(slot: Slot, handle: SessionHandle, reason: string): void {
    if (!handle.markDead()) {
      return;
    }
    if (slot.handle === handle) {
      slot.handle = undefined;
    }

    this.metrics.increment('sessions.recycled');
    this.log.debug('Recycling browser session', {
      slotIndex: slot.index,
      sessionId: handle.sessionId,
      pagesServed: handle.pagesServed,
      reason,
    });

    this.trackTeardown(handle);
    this.publishGauges();

    if (!this.isShuttingDown) {
      void this.startSlot(slot);
    }
  }

  private onHeartbeatFailed(handle: SessionHandle, error: Error): void {
    if (handle.currentState === 'dead') {
      return;
    }

    handle.markUnresponsive();
    this.log.warn('Browser session heartbeat failed', {
      slotIndex: handle.slotIndex,
      sessionId: handle.sessionId,
      err: error,
    });

    const slot = this.slots[handle.slotIndex];
    if (slot && handle.currentState === 'ready' && !this.isShuttingDown) {
      this.recycle(slot, handle, 'heartbeat failed');
    }
  }

  private startHeartbeat(): void {
    const interval = this.config.heartbeatIntervalMs;
    if (this.heartbeatTimer || interval <= 0 || !this.provider.ping || this.isShuttingDown) {
      return;
    }

    this.heartbeatTimer = setInterval(() => {
      void this.checkLiveness();
    }, interval);
    this.heartbeatTimer.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
    }
  }

  private trackTeardown(handle: SessionHandle): void {
    if (!handle.hasSession()) {
      return;
    }

    const teardown: Promise<void> = this.destroy(handle.session, handle.slotIndex).finally(() => {
      this.teardowns.delete(teardown);
    });
    this.teardowns.add(teardown);
  }

  private async destroy(session: ProvisionedSession, slotIndex: number): Promise<void> {
    try {
      await this.provider.destroySession(session);
    } catch (error) {
      this.metrics.increment('teardown.failed');
      this.log.warn('Browser session teardown failed', {
        slotIndex,
        sessionId: session.sessionId,
        err: toError(error),
      });
    }
  }

  private async runShutdown(timeoutMs: number): Promise<void> {
    this.phase = 'shutting-down';
    this.log.info('Shutting down browser pool', this.getStats());

    const reason = new PoolShutDownError();
    this.lifecycle.abort(reason);
    this.gate.close(reason);
    this.stopHeartbeat();
    this.rejectWaiters(reason);

    for (const slot of this.slots) {
      this.clearRetry(slot);

      const handle = slot.handle;
      if (!handle || handle.currentState === 'starting') {
        continue;
      }
      handle.markDead();
      slot.handle = undefined;
      this.trackTeardown(handle);
    }

    const pending: Promise<unknown>[] = [
      ...this.teardowns,
      ...this.slots.flatMap((slot) => (slot.task ? [slot.task] : [])),
    ];

    const completed = await this.settleWithin(pending, timeoutMs);
    if (!completed) {
      this.log.warn('Shutdown deadline elapsed, abandoning pending teardowns', {
        timeoutMs,
        pending: this.teardowns.size,
      });
    }

    this.phase = 'closed';
    this.metrics.log(this.log);
    this.log.info('Browser pool shut down');
  }

  private async settleWithin(pending: Promise<unknown>[], timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([Promise.allSettled(pending).then(() => true), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}
