import type { LiveVerdict, MarketFingerprint } from "@tradewarden/shared";
import { fingerprintKey } from "@tradewarden/shared";

import { type Clock, systemClock } from "../runtime/clock";

type CacheEntry = {
  verdict: LiveVerdict;
  insertedAtMs: number;
  expiresAtMs: number;
};

export type CachedEntry = {
  verdict: LiveVerdict;
  cachedAt: string;
};

/**
 * Verdicts keyed by market fingerprint. Expiry counts from insertion; reads never extend it.
 */
export class AdvisoryCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(
    private readonly ttlMs: number,
    private readonly clock: Clock = systemClock
  ) {
    if (!(ttlMs > 0)) {
      throw new Error(`Cache TTL must be positive, got ${ttlMs}`);
    }
  }

  get(fingerprint: MarketFingerprint): CachedEntry | null {
    const key = fingerprintKey(fingerprint);
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (this.clock() >= entry.expiresAtMs) {
      this.entries.delete(key);
      return null;
    }
    return { verdict: entry.verdict, cachedAt: new Date(entry.insertedAtMs).toISOString() };
  }

  put(fingerprint: MarketFingerprint, verdict: LiveVerdict): void {
    const now = this.clock();
    this.evictExpired(now);
    this.entries.set(fingerprintKey(fingerprint), { verdict, insertedAtMs: now, expiresAtMs: now + this.ttlMs });
  }

  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  private evictExpired(now: number): void {
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAtMs) this.entries.delete(key);
    }
  }
}
