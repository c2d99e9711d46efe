import pino from "pino";
import { afterEach, describe, expect, it, vi } from "vitest";

import type { AdvisorResponse } from "@tradewarden/shared";
import { AdvisorUnavailableError } from "@tradewarden/shared";

import { T0 } from "../../testing/bars";
import { makeSignal } from "../../testing/signals";
import { AdvisoryCache } from "./advisory-cache";
import { AdvisoryService, type AdvisoryPolicy } from "./advisory.service";
import type { AdvisorPort, SignalContext } from "./advisor.port";
import { QuotaGuard } from "./quota-guard";

const WINDOW_MS = 15 * 60_000;

const policy: AdvisoryPolicy = {
  minimumSignalStrength: 0.7,
  validationThreshold: 80,
  cacheWindowMs: WINDOW_MS,
  advisorTimeoutMs: 1_000
};

function setup(opts: { limit?: number; advisor?: AdvisorPort | null } = {}) {
  const clock = { now: T0 };
  const now = () => clock.now;
  const infer = vi.fn(
    async (_context: SignalContext, _signal: AbortSignal): Promise<AdvisorResponse> => ({ recommendation: "APPROVE", confidence: 90, reasoning: "trend confirmed" })
  );
  const advisor = opts.advisor === undefined ? { infer } : opts.advisor;
  const quota = new QuotaGuard(opts.limit ?? 50, now);
  const cache = new AdvisoryCache(WINDOW_MS, now);
  const service = new AdvisoryService(policy, quota, cache, advisor, pino({ level: "silent" }), now);
  return { clock, infer, quota, cache, service };
}

describe("AdvisoryService.evaluate", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("serves the second call for the same market from cache", async () => {
    const { infer, service } = setup();
    const signal = makeSignal();

    const first = await service.evaluate(signal);
    const second = await service.evaluate(signal);

    expect(first).toEqual({
      source: "LIVE",
      confidence: 90,
      recommendation: "APPROVE",
      reasoning: "trend confirmed",
      producedAt: "2024-01-01T00:00:00.000Z"
    });
    expect(second).toEqual({ ...first, source: "CACHED", cachedAt: "2024-01-01T00:00:00.000Z" });
    expect(infer).toHaveBeenCalledTimes(1);
    expect(service.getUsageStats()).toMatchObject({ callsToday: 1, liveCalls: 1, cacheHits: 1, fallbacks: 0, cacheEntries: 1 });
  });

  it("calls the advisor again once the cached verdict expires", async () => {
    const { clock, infer, service } = setup();
    const signal = makeSignal();

    await service.evaluate(signal);
    clock.now += WINDOW_MS;
    const again = await service.evaluate(signal);

    expect(again.source).toBe("LIVE");
    expect(infer).toHaveBeenCalledTimes(2);
  });

  it("answers weak signals from the rules without spending quota", async () => {
    const { infer, service } = setup();

    const verdict = await service.evaluate(makeSignal({ strength: 0.5 }));

    expect(verdict).toEqual({
      source: "FALLBACK",
      reason: "WEAK_SIGNAL",
      confidence: 50,
      recommendation: "NEUTRAL",
      reasoning: "Rule-based verdict (weak signal): Bullish trend; Strong trend (ADX 40.0)",
      producedAt: "2024-01-01T00:00:00.000Z"
    });
    expect(infer).not.toHaveBeenCalled();
    expect(service.getUsageStats().callsToday).toBe(0);
  });

  it("approves strong signals from the rules when the advisor is disabled", async () => {
    const { service } = setup({ advisor: null });

    const verdict = await service.evaluate(makeSignal({ strength: 0.85 }));

    expect(verdict).toMatchObject({ source: "FALLBACK", reason: "ADVISOR_DISABLED", confidence: 85, recommendation: "APPROVE" });
    expect(service.getUsageStats()).toMatchObject({ callsToday: 0, advisorEnabled: false });
  });

  it("falls back once the daily quota is used up and leaves the counter alone", async () => {
    const { infer, service } = setup({ limit: 1 });

    await service.evaluate(makeSignal());
    const exhausted = await service.evaluate(makeSignal({ snapshot: { symbol: "ETHUSDT" } }));

    expect(exhausted).toMatchObject({ source: "FALLBACK", reason: "QUOTA_EXHAUSTED" });
    expect(infer).toHaveBeenCalledTimes(1);
    expect(service.getUsageStats()).toMatchObject({ callsToday: 1, dailyLimit: 1, remainingCalls: 0, usagePercent: 100 });
  });

  it("does not cache advisor failures", async () => {
    const infer = vi
      .fn<(context: SignalContext, signal: AbortSignal) => Promise<AdvisorResponse>>()
      .mockRejectedValueOnce(new AdvisorUnavailableError("HTTP_ERROR", "Advisor HTTP 500"))
      .mockResolvedValueOnce({ recommendation: "REJECT", confidence: 70, reasoning: "" });
    const { cache, service } = setup({ advisor: { infer } });
    const signal = makeSignal();

    const failed = await service.evaluate(signal);
    expect(failed).toMatchObject({ source: "FALLBACK", reason: "ADVISOR_FAILED", recommendation: "APPROVE" });
    expect(cache.size()).toBe(0);

    const retried = await service.evaluate(signal);
    expect(retried).toMatchObject({ source: "LIVE", recommendation: "REJECT", confidence: 70 });
    expect(service.getUsageStats().callsToday).toBe(2);
  });

  it("treats an advisor that outlives the timeout as failed", async () => {
    vi.useFakeTimers();
    const { service } = setup({ advisor: { infer: () => new Promise<AdvisorResponse>(() => undefined) } });

    const pending = service.evaluate(makeSignal());
    await vi.advanceTimersByTimeAsync(1_000);

    await expect(pending).resolves.toMatchObject({ source: "FALLBACK", reason: "ADVISOR_FAILED" });
  });

  it("never lets concurrent callers exceed the daily limit", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const infer = vi.fn(async (): Promise<AdvisorResponse> => {
      await gate;
      return { recommendation: "APPROVE", confidence: 88, reasoning: "" };
    });
    const { service } = setup({ limit: 2, advisor: { infer } });
    const symbols = ["BTCUSDT", "ETHUSDT", "SOLUSDT", "BNBUSDT", "XRPUSDT"];

    const pending = Promise.all(symbols.map((symbol) => service.evaluate(makeSignal({ snapshot: { symbol } }))));
    release();
    const verdicts = await pending;

    expect(verdicts.map((v) => v.source)).toEqual(["LIVE", "LIVE", "FALLBACK", "FALLBACK", "FALLBACK"]);
    expect(infer).toHaveBeenCalledTimes(2);
    expect(service.getUsageStats().callsToday).toBe(2);
  });

  it("shares one advisor call between concurrent callers for the same market", async () => {
    const { infer, service } = setup();
    const signal = makeSignal();

    const [a, b] = await Promise.all([service.evaluate(signal), service.evaluate(signal)]);

    expect(a).toEqual(b);
    expect(infer).toHaveBeenCalledTimes(1);
    expect(service.getUsageStats().callsToday).toBe(1);
  });

  it("resets the quota at the UTC day boundary", async () => {
    const { clock, infer, service } = setup({ limit: 1 });

    await service.evaluate(makeSignal());
    clock.now = Date.UTC(2024, 0, 2, 0, 0, 0);
    const nextDay = await service.evaluate(makeSignal({ timestamp: clock.now, snapshot: { barTime: clock.now } }));

    expect(nextDay.source).toBe("LIVE");
    expect(infer).toHaveBeenCalledTimes(2);
    expect(service.getUsageStats()).toMatchObject({ callsToday: 1, windowStartDate: "2024-01-02" });
  });
});

describe("AdvisoryService.validate", () => {
  const intent = {
    symbol: "BTCUSDT",
    direction: "LONG",
    sizeUSD: 100,
    entryPrice: 100,
    stopLossPrice: 98,
    takeProfitPrice: 103
  } as const;

  it("skips validation for signals below the threshold", async () => {
    const { infer, service } = setup();

    await expect(service.validate(intent, makeSignal({ strength: 0.75 }))).resolves.toBeNull();
    expect(infer).not.toHaveBeenCalled();
  });

  it("asks the advisor about the sized order under its own cache key", async () => {
    const { infer, service } = setup();
    const signal = makeSignal({ strength: 0.85 });

    await service.evaluate(signal);
    const verdict = await service.validate(intent, signal);

    expect(verdict?.source).toBe("LIVE");
    expect(infer).toHaveBeenCalledTimes(2);
    const context = infer.mock.calls[1]?.[0];
    expect(context?.kind).toBe("SIGNAL_VALIDATION");
    expect(context?.order).toEqual({ sizeUSD: 100, entryPrice: 100, stopLossPrice: 98, takeProfitPrice: 103 });
  });
});
