import { describe, it, expect } from 'vitest';
import { StartupGate } from './startup-gate.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

describe('StartupGate', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => new StartupGate(0)).toThrow(RangeError);
    expect(() => new StartupGate(1.5)).toThrow(RangeError);
  });

  it('grants permits immediately while under capacity', async () => {
    const gate = new StartupGate(2);

    await gate.acquire();
    await gate.acquire();

    expect(gate.inFlight).toBe(2);
    expect(gate.pending).toBe(0);
  });

  it('queues acquisitions beyond capacity until a release', async () => {
    const gate = new StartupGate(1);
    const first = await gate.acquire();

    let granted = false;
    const second = gate.acquire().then((permit) => {
      granted = true;
      return permit;
    });

    await tick();
    expect(granted).toBe(false);
    expect(gate.pending).toBe(1);

    gate.release(first);
    await second;

    expect(granted).toBe(true);
    expect(gate.inFlight).toBe(1);
    expect(gate.pending).toBe(0);
  });

  it('serves waiters in FIFO order', async () => {
    const gate = new StartupGate(1);
    const held = await gate.acquire();
    const order: string[] = [];

    const a = gate.acquire().then((permit) => {
      order.push('a');
      gate.release(permit);
    });
    const b = gate.acquire().then((permit) => {
      order.push('b');
      gate.release(permit);
    });
    const c = gate.acquire().then((permit) => {
      order.push('c');
      gate.release(permit);
    });

    gate.release(held);
    await Promise.all([a, b, c]);

    expect(order).toEqual(['a', 'b', 'c']);
    expect(gate.inFlight).toBe(0);
  });

  it('ignores a second release of the same permit', async () => {
    const gate = new StartupGate(2);
    const permit = await gate.acquire();
    await gate.acquire();

    gate.release(permit);
    gate.release(permit);

    expect(gate.inFlight).toBe(1);
  });

  it('bounds concurrent tasks run through the gate', async () => {
    const gate = new StartupGate(3);
    let running = 0;
    let peak = 0;
    const release = deferred();

    const tasks = Array.from({ length: 10 }, () =>
      gate.run(async () => {
        running += 1;
        peak = Math.max(peak, running);
        await release.promise;
        running -= 1;
      }),
    );

    await tick();
    expect(running).toBe(3);
    expect(gate.pending).toBe(7);

    release.resolve();
    await Promise.all(tasks);

    expect(peak).toBe(3);
    expect(gate.inFlight).toBe(0);
  });

  it('releases the permit when the task throws', async () => {
    const gate = new StartupGate(1);

    await expect(
      gate.run(async () => {
        throw new Error('provisioning exploded');
      }),
    ).rejects.toThrow('provisioning exploded');

    expect(gate.inFlight).toBe(0);
  });

  it('an aborted wait leaves the queue without consuming a permit', async () => {
    const gate = new StartupGate(1);
    const held = await gate.acquire();
    const controller = new AbortController();

    const aborted = gate.acquire(controller.signal);
    const next = gate.acquire();
    controller.abort(new Error('caller gave up'));

    await expect(aborted).rejects.toThrow('caller gave up');
    expect(gate.pending).toBe(1);

    gate.release(held);
    await next;
    expect(gate.inFlight).toBe(1);
  });

  it('rejects immediately with an already aborted signal', async () => {
    const gate = new StartupGate(1);
    const controller = new AbortController();
    controller.abort(new Error('too late'));

    await expect(gate.acquire(controller.signal)).rejects.toThrow('too late');
    expect(gate.inFlight).toBe(0);
  });

  it('close rejects queued and future acquisitions', async () => {
    const gate = new StartupGate(1);
    const held = await gate.acquire();
    const queued = gate.acquire();

    gate.close(new Error('gate closed'));

    await expect(queued).rejects.toThrow('gate closed');
    await expect(gate.acquire()).rejects.toThrow('gate closed');
    expect(gate.closed).toBe(true);

    gate.release(held);
    expect(gate.inFlight).toBe(0);
  });
});
