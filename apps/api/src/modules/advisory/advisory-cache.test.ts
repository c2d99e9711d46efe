import { describe, expect, it } from "vitest";

import type { LiveVerdict, MarketFingerprint } from "@tradewarden/shared";

import { T0 } from "../../testing/bars";
import { AdvisoryCache } from "./advisory-cache";

const fp: MarketFingerprint = { namespace: "PRIMARY", symbol: "BTCUSDT", timeframe: "15m", bucketStart: T0 };
const verdict: LiveVerdict = { source: "LIVE", confidence: 72, recommendation: "NEUTRAL", reasoning: "mixed", producedAt: "2024-01-01T00:00:00.000Z" };

describe("AdvisoryCache", () => {
  it("returns entries until the TTL elapses from insertion", () => {
    const clock = { now: T0 };
    const cache = new AdvisoryCache(60_000, () => clock.now);
    cache.put(fp, verdict);

    clock.now = T0 + 59_999;
    expect(cache.get(fp)).toEqual({ verdict, cachedAt: "2024-01-01T00:00:00.000Z" });

    clock.now = T0 + 60_000;
    expect(cache.get(fp)).toBeNull();
    expect(cache.size()).toBe(0);
  });

  it("keys primary and validation verdicts separately", () => {
    const cache = new AdvisoryCache(60_000, () => T0);
    cache.put(fp, verdict);

    expect(cache.get({ ...fp, namespace: "VALIDATION" })).toBeNull();
    expect(cache.get({ ...fp, bucketStart: T0 + 900_000 })).toBeNull();
  });

  it("sweeps expired entries when a new one is stored", () => {
    const clock = { now: T0 };
    const cache = new AdvisoryCache(1_000, () => clock.now);
    cache.put(fp, verdict);
    cache.put({ ...fp, symbol: "ETHUSDT" }, verdict);

    clock.now = T0 + 5_000;
    cache.put({ ...fp, symbol: "SOLUSDT" }, verdict);

    expect(cache.size()).toBe(1);
  });

  it("rejects a non-positive TTL", () => {
    expect(() => new AdvisoryCache(0)).toThrow("Cache TTL must be positive, got 0");
  });
});
