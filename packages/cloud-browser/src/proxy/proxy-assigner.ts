import { ProvisioningError, toError } from '../errors.js';

type ProxyOrdering = 'random' | 'round-robin';

type RandomSource = () => number;

type ProxySource = () => Promise<string>;

/**
 * Host and port of a proxy URL, without credentials, for log lines.
 */
function proxyHost(proxy: string | null): string | null {
  if (proxy === null) {
    return null;
  }
  try {
    return new URL(proxy).host;
  } catch {
    return '[unparseable proxy]';
  }
}

/**
 * Picks the proxy for the handle about to occupy a slot.
 *
 * Round-robin keeps one cursor per slot: a slot starts at
 * `slotIndex mod proxies.length` and moves one step on every later
 * assignment, so a recycled slot walks the whole list.
 *
 * Given a source function instead of a list, every assignment asks the
 * source and ordering does not apply.
 */
export class ProxyAssigner {
  private readonly proxies: readonly string[];
  private readonly source: ProxySource | undefined;
  private readonly ordering: ProxyOrdering;
  private readonly random: RandomSource;
  private readonly cursors: Map<number, number>;

  constructor(
    proxies: readonly string[] | ProxySource,
    ordering: ProxyOrdering,
    random: RandomSource = Math.random,
  ) {
    if (typeof proxies === 'function') {
      this.proxies = [];
      this.source = proxies;
    } else {
      this.proxies = [...proxies];
      this.source = undefined;
    }
    this.ordering = ordering;
    this.random = random;
    this.cursors = new Map();
  }

  assign(slotIndex: number): string | null {
    const count = this.proxies.length;
    if (count === 0) {
      return null;
    }

    if (this.ordering === 'random') {
      const index = Math.min(Math.floor(this.random() * count), count - 1);
      return this.proxies[index] ?? null;
    }

    const previous = this.cursors.get(slotIndex);
    const next = previous === undefined ? slotIndex % count : (previous + 1) % count;
    this.cursors.set(slotIndex, next);

    return this.proxies[next] ?? null;
  }

  /**
   * Proxy for the next session of a slot. A rejecting source becomes a
   * ProvisioningError of kind `proxy`.
   */
  async next(slotIndex: number): Promise<string | null> {
    if (!this.source) {
      return this.assign(slotIndex);
    }

    try {
      return await this.source();
    } catch (error) {
      throw new ProvisioningError(
        `Proxy source failed: ${toError(error).message}`,
        'proxy',
        undefined,
        { cause: error },
      );
    }
  }

  reset(): void {
    this.cursors.clear();
  }

  get size(): number {
    return this.proxies.length;
  }

  get dynamic(): boolean {
    return this.source !== undefined;
  }
}

export { proxyHost };
export type { ProxyOrdering, RandomSource, ProxySource };
