/**
 * Replay Nonce Pool
 *
 * Every signed request consumes one CA nonce. Nonces harvested from
 * responses are pooled; a request finding the pool empty fetches its own
 * fresh nonce, so concurrent requests never share one.
 */

import { NONCE_MAX_AGE_MS, NONCE_MAX_POOL_SIZE } from '../constants/defaults.js';
import { debugNonce } from '../utils/debug.js';

/** Fetches one fresh nonce from the CA */
export type NonceFetcher = () => Promise<string>;

export interface NonceManagerOptions {
  fetchNonce: NonceFetcher;
  /** Max nonce age (ms) before it is discarded. Defaults to 120 seconds. */
  maxAgeMs?: number;
  /** Hard cap on pool size; the oldest nonces are dropped first. Defaults to 32. */
  maxPool?: number;
}

/**
 * Nonce value with timestamp for staleness tracking
 */
export interface NonceEntry {
  value: string;
  timestamp: number;
}

export class NonceManager {
  private readonly opts: Required<NonceManagerOptions>;
  private readonly pool: NonceEntry[] = [];

  constructor(opts: NonceManagerOptions) {
    this.opts = {
      maxAgeMs: NONCE_MAX_AGE_MS,
      maxPool: NONCE_MAX_POOL_SIZE,
      ...opts,
    };
  }

  /**
   * Take the newest fresh nonce from the pool, or fetch one
   */
  async get(): Promise<string> {
    this.cleanStale();

    const entry = this.pool.pop();
    if (entry) {
      debugNonce('returning pooled nonce, pool size now=%d', this.pool.length);
      return entry.value;
    }

    debugNonce('pool empty, fetching nonce');
    return this.opts.fetchNonce();
  }

  /**
   * Add a nonce harvested from a CA response
   */
  add(value: string): void {
    this.pool.push({ value, timestamp: Date.now() });
    if (this.pool.length > this.opts.maxPool) {
      this.pool.splice(0, this.pool.length - this.opts.maxPool);
    }
    debugNonce('pooled nonce, pool size=%d', this.pool.length);
  }

  size(): number {
    this.cleanStale();
    return this.pool.length;
  }

  private cleanStale(): void {
    const cutoff = Date.now() - this.opts.maxAgeMs;
    const fresh = this.pool.filter((entry) => entry.timestamp >= cutoff);
    if (fresh.length !== this.pool.length) {
      debugNonce('dropped %d stale nonces', this.pool.length - fresh.length);
      this.pool.splice(0, this.pool.length, ...fresh);
    }
  }
}
