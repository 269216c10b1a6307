import type { RateLimitSettings } from "./types";

type BucketState = { tokens: number; last: number; blockedUntil: number };

const SWEEP_EVERY = 1024;

/**
 * Token bucket per client address. A client that drains its bucket is
 * refused outright for `blockSeconds`. A `qps` of 0 turns limiting off.
 */
export class RateLimiter {
  private readonly buckets = new Map<string, BucketState>();
  private readonly burst: number;
  private readonly qps: number;
  private readonly blockMs: number;
  private checks = 0;

  constructor(
    settings: RateLimitSettings,
    private readonly now: () => number = Date.now,
  ) {
    this.qps = Math.max(0, settings.qps);
    this.burst = Math.max(1, settings.burst);
    this.blockMs = Math.max(0, settings.blockSeconds) * 1000;
  }

  get enabled() {
    return this.qps > 0;
  }

  get size() {
    return this.buckets.size;
  }

  allow(address: string): boolean {
    if (!this.enabled) return true;

    const key = address || "unknown";
    const now = this.now();
    if (++this.checks % SWEEP_EVERY === 0) {
      this.sweep(now);
    }

    const state = this.buckets.get(key) ?? {
      tokens: this.burst,
      last: now,
      blockedUntil: 0,
    };
    if (now < state.blockedUntil) {
      this.buckets.set(key, state);
      return false;
    }

    const elapsed = Math.max(0, now - state.last) / 1000;
    state.tokens = Math.min(this.burst, state.tokens + elapsed * this.qps);
    state.last = now;
    if (state.tokens < 1) {
      state.blockedUntil = now + this.blockMs;
      this.buckets.set(key, state);
      return false;
    }
    state.tokens -= 1;
    this.buckets.set(key, state);
    return true;
  }

  /** Drops buckets that have refilled completely and are not blocked. */
  sweep(now = this.now()) {
    const refillMs = (this.burst / Math.max(this.qps, Number.MIN_VALUE)) * 1000;
    for (const [key, state] of this.buckets) {
      if (now >= state.blockedUntil && now - state.last >= refillMs) {
        this.buckets.delete(key);
      }
    }
  }
}
