/** Proxy pool with single-holder exclusivity */
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { ProxyEndpoint } from '../types.js';

export interface ProxyPoolOptions {
  logger?: Logger;
  /** Source of randomness in [0, 1); replaceable in tests */
  random?: () => number;
}

/**
 * Every method is synchronous. Each call runs to completion before any other
 * worker resumes, so the in-use set never changes under a caller's feet.
 * Do not add an `await` to these methods.
 */
export class ProxyPool {
  private working: ProxyEndpoint[];
  private readonly inUse = new Set<string>();
  private readonly logger: Logger;
  private readonly random: () => number;

  constructor(endpoints: readonly ProxyEndpoint[], options: ProxyPoolOptions = {}) {
    const seen = new Set<string>();
    this.working = endpoints.filter(e => {
      if (seen.has(e.name)) return false;
      seen.add(e.name);
      return true;
    });
    this.logger = (options.logger ?? silentLogger).child({ component: 'ProxyPool' });
    this.random = options.random ?? Math.random;
  }

  /** Number of endpoints still considered working. */
  get size(): number {
    return this.working.length;
  }

  get inUseCount(): number {
    return this.inUse.size;
  }

  get availableCount(): number {
    return this.working.length - this.inUse.size;
  }

  /** Takes a random free endpoint, or null when every endpoint is held. */
  acquire(): ProxyEndpoint | null {
    const available = this.working.filter(p => !this.inUse.has(p.name));
    if (available.length === 0) return null;

    const index = Math.min(Math.floor(this.random() * available.length), available.length - 1);
    const proxy = available[index];
    this.inUse.add(proxy.name);
    return proxy;
  }

  release(proxy: ProxyEndpoint | null): void {
    if (!proxy) return;
    this.inUse.delete(proxy.name);
  }

  /** Drops an endpoint from rotation, releasing it first if held. */
  markFailed(proxy: ProxyEndpoint | null): void {
    if (!proxy) return;
    this.inUse.delete(proxy.name);
    const before = this.working.length;
    this.working = this.working.filter(p => p.name !== proxy.name);
    if (this.working.length < before) {
      this.logger.warn({ proxy: proxy.name, remaining: this.working.length }, 'Proxy marked as failed and removed from pool');
    }
  }

  isHeld(proxy: ProxyEndpoint): boolean {
    return this.inUse.has(proxy.name);
  }

  getStats() {
    return { total: this.working.length, inUse: this.inUse.size, available: this.availableCount };
  }
}
