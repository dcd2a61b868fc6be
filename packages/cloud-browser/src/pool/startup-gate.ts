import { abortReason } from '../errors.js';

class StartupPermit {
  private static nextId = 0;

  readonly id: number;
  released: boolean;

  constructor() {
    StartupPermit.nextId += 1;
    this.id = StartupPermit.nextId;
    this.released = false;
  }
}

type Waiter = {
  grant: (permit: StartupPermit) => void;
  fail: (error: Error) => void;
};

const ABORTED = 'Startup gate acquisition aborted';

/**
 * Counting semaphore bounding concurrent session provisioning calls.
 * Waiters are granted permits strictly in arrival order.
 */
export class StartupGate {
  readonly capacity: number;
  private outstanding: number;
  private readonly waiters: Waiter[];
  private closedWith: Error | undefined;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Startup gate capacity must be a positive integer, got ${capacity}`);
    }

    this.capacity = capacity;
    this.outstanding = 0;
    this.waiters = [];
    this.closedWith = undefined;
  }

  acquire(signal?: AbortSignal): Promise<StartupPermit> {
    if (this.closedWith) {
      return Promise.reject(this.closedWith);
    }

    if (signal?.aborted) {
      return Promise.reject(abortReason(signal, ABORTED));
    }

    if (this.outstanding < this.capacity && this.waiters.length === 0) {
      this.outstanding += 1;
      return Promise.resolve(new StartupPermit());
    }

    return new Promise<StartupPermit>((resolve, reject) => {
      let detach = () => {};

      const waiter: Waiter = {
        grant: (permit) => {
          detach();
          resolve(permit);
        },
        fail: (error) => {
          detach();
          reject(error);
        },
      };

      this.waiters.push(waiter);

      if (signal) {
        const onAbort = () => {
          this.removeWaiter(waiter);
          reject(abortReason(signal, ABORTED));
        };
        signal.addEventListener('abort', onAbort, { once: true });
        detach = () => signal.removeEventListener('abort', onAbort);
      }
    });
  }

  release(permit: StartupPermit): void {
    if (permit.released) {
      return;
    }
    permit.released = true;

    const next = this.waiters.shift();
    if (next) {
      next.grant(new StartupPermit());
      return;
    }

    this.outstanding -= 1;
  }

  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const permit = await this.acquire(signal);
    try {
      return await task();
    } finally {
      this.release(permit);
    }
  }

  /**
   * Rejects every queued acquisition and all future ones with `reason`.
   * Permits already granted stay valid until released.
   */
  close(reason: Error): void {
    if (this.closedWith) {
      return;
    }
    this.closedWith = reason;

    const pending = this.waiters.splice(0, this.waiters.length);
    for (const waiter of pending) {
      waiter.fail(reason);
    }
  }

  get inFlight(): number {
    return this.outstanding;
  }

  get pending(): number {
    return this.waiters.length;
  }

  get closed(): boolean {
    return this.closedWith !== undefined;
  }

  private removeWaiter(waiter: Waiter): void {
    const index = this.waiters.indexOf(waiter);
    if (index !== -1) {
      this.waiters.splice(index, 1);
    }
  }
}

export { StartupPermit };
