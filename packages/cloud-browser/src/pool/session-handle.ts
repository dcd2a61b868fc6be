import type { ProvisionedSession } from '../provisioning/types.js';

type SessionState = 'starting' | 'ready' | 'busy' | 'dead';

type SessionHandleInfo = {
  slotIndex: number;
  sessionId: string | undefined;
  assignedProxy: string | null;
  state: SessionState;
  pagesServed: number;
  alive: boolean;
  createdAt: number;
};

class InvalidSessionStateError extends Error {
  constructor(action: string, state: SessionState) {
    super(`Cannot ${action} a session handle in state "${state}"`);
    this.name = 'InvalidSessionStateError';
  }
}

/**
 * The pool's record of one remote browser session occupying a slot.
 * A handle is never reused: recycling a slot installs a fresh handle.
 */
export class SessionHandle {
  readonly slotIndex: number;
  readonly assignedProxy: string | null;
  readonly createdAt: number;
  private provisioned: ProvisionedSession | undefined;
  private state: SessionState;
  private served: number;
  private isAlive: boolean;

  constructor(slotIndex: number, assignedProxy: string | null) {
    this.slotIndex = slotIndex;
    this.assignedProxy = assignedProxy;
    this.createdAt = Date.now();
    this.provisioned = undefined;
    this.state = 'starting';
    this.served = 0;
    this.isAlive = true;
  }

  markReady(session: ProvisionedSession): void {
    this.expect('starting', 'activate');
    this.provisioned = session;
    this.state = 'ready';
  }

  markBusy(): void {
    this.expect('ready', 'acquire');
    this.state = 'busy';
  }

  markIdle(): void {
    this.expect('busy', 'release');
    this.state = 'ready';
  }

  recordPage(): void {
    this.expect('busy', 'count a page on');
    this.served += 1;
  }

  markUnresponsive(): void {
    this.isAlive = false;
  }

  /**
   * Returns false when the handle was already dead.
   */
  markDead(): boolean {
    if (this.state === 'dead') {
      return false;
    }
    this.state = 'dead';
    this.isAlive = false;
    return true;
  }

  isExhausted(pagesPerBrowser: number): boolean {
    return this.served >= pagesPerBrowser;
  }

  get session(): ProvisionedSession {
    if (!this.provisioned) {
      throw new InvalidSessionStateError('use the remote session of', this.state);
    }
    return this.provisioned;
  }

  hasSession(): boolean {
    return this.provisioned !== undefined;
  }

  get sessionId(): string | undefined {
    return this.provisioned?.sessionId;
  }

  get currentState(): SessionState {
    return this.state;
  }

  get pagesServed(): number {
    return this.served;
  }

  get alive(): boolean {
    return this.isAlive;
  }

  get info(): SessionHandleInfo {
    return {
      slotIndex: this.slotIndex,
      sessionId: this.sessionId,
      assignedProxy: this.assignedProxy,
      state: this.state,
      pagesServed: this.served,
      alive: this.isAlive,
      createdAt: this.createdAt,
    };
  }

  private expect(state: SessionState, action: string): void {
    if (this.state !== state) {
      throw new InvalidSessionStateError(action, this.state);
    }
  }
}

export { InvalidSessionStateError };
export type { SessionState, SessionHandleInfo };
