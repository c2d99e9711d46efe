import type {
  AdvisoryVerdict,
  FallbackReason,
  FallbackVerdict,
  FingerprintNamespace,
  LiveVerdict,
  MarketFingerprint,
  OrderIntent,
  Signal
} from "@tradewarden/shared";
import { errorMessage, fingerprintKey } from "@tradewarden/shared";
import type { Logger } from "pino";

import { type Clock, systemClock } from "../runtime/clock";
import { withTimeout } from "../runtime/with-timeout";
import type { AdvisoryCache } from "./advisory-cache";
import type { AdvisorPort, SignalContext } from "./advisor.port";
import type { QuotaGuard } from "./quota-guard";

export type AdvisoryPolicy = {
  minimumSignalStrength: number;
  /** On the 0-100 confidence scale. */
  validationThreshold: number;
  cacheWindowMs: number;
  advisorTimeoutMs: number;
};

export type AdvisoryUsageStats = {
  callsToday: number;
  dailyLimit: number;
  remainingCalls: number;
  usagePercent: number;
  cacheEntries: number;
  windowStartDate: string;
  liveCalls: number;
  cacheHits: number;
  fallbacks: number;
  advisorEnabled: boolean;
};

export function fingerprintFor(namespace: FingerprintNamespace, signal: Signal, cacheWindowMs: number): MarketFingerprint {
  return {
    namespace,
    symbol: signal.symbol,
    timeframe: signal.snapshot.timeframe,
    bucketStart: Math.floor(signal.timestamp / cacheWindowMs) * cacheWindowMs
  };
}

export class AdvisoryService {
  private readonly inFlight = new Map<string, Promise<AdvisoryVerdict>>();
  private liveCalls = 0;
  private cacheHits = 0;
  private fallbacks = 0;

  constructor(
    private readonly policy: AdvisoryPolicy,
    private readonly quota: QuotaGuard,
    private readonly cache: AdvisoryCache,
    private readonly advisor: AdvisorPort | null,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock
  ) {}

  async evaluate(signal: Signal): Promise<AdvisoryVerdict> {
    if (signal.strength < this.policy.minimumSignalStrength) {
      return this.fallback(signal, "WEAK_SIGNAL");
    }
    return await this.consult("PRIMARY", signal, this.contextFor("MARKET_ANALYSIS", signal));
  }

  /**
   * Second opinion on a sized order. Only strong signals are worth the extra call; below the threshold
   * this returns null and the order proceeds on the primary verdict.
   */
  async validate(intent: OrderIntent, signal: Signal): Promise<AdvisoryVerdict | null> {
    if (signal.strength * 100 < this.policy.validationThreshold) {
      return null;
    }
    const context: SignalContext = {
      ...this.contextFor("SIGNAL_VALIDATION", signal),
      order: {
        sizeUSD: intent.sizeUSD,
        entryPrice: intent.entryPrice,
        stopLossPrice: intent.stopLossPrice,
        takeProfitPrice: intent.takeProfitPrice
      }
    };
    return await this.consult("VALIDATION", signal, context);
  }

  getUsageStats(): AdvisoryUsageStats {
    const quota = this.quota.snapshot();
    return {
      callsToday: quota.callsToday,
      dailyLimit: quota.limit,
      remainingCalls: Math.max(0, quota.limit - quota.callsToday),
      usagePercent: quota.limit > 0 ? (quota.callsToday / quota.limit) * 100 : 100,
      cacheEntries: this.cache.size(),
      windowStartDate: quota.windowStartDate,
      liveCalls: this.liveCalls,
      cacheHits: this.cacheHits,
      fallbacks: this.fallbacks,
      advisorEnabled: this.advisor !== null
    };
  }

  private async consult(namespace: FingerprintNamespace, signal: Signal, context: SignalContext): Promise<AdvisoryVerdict> {
    const fingerprint = fingerprintFor(namespace, signal, this.policy.cacheWindowMs);

    if (!this.advisor) {
      return this.fallback(signal, "ADVISOR_DISABLED");
    }

    const cached = this.cache.get(fingerprint);
    if (cached) {
      this.cacheHits += 1;
      return { ...cached.verdict, source: "CACHED", cachedAt: cached.cachedAt };
    }

    const key = fingerprintKey(fingerprint);
    const pending = this.inFlight.get(key);
    if (pending) {
      return await pending;
    }

    if (!this.quota.tryConsume()) {
      this.logger.info({ msg: "Advisor quota exhausted", symbol: signal.symbol, namespace });
      return this.fallback(signal, "QUOTA_EXHAUSTED");
    }

    const call = this.callAdvisor(this.advisor, fingerprint, signal, context);
    this.inFlight.set(key, call);
    try {
      return await call;
    } finally {
      this.inFlight.delete(key);
    }
  }

  private async callAdvisor(advisor: AdvisorPort, fingerprint: MarketFingerprint, signal: Signal, context: SignalContext): Promise<AdvisoryVerdict> {
    try {
      const response = await withTimeout("advisor.infer", this.policy.advisorTimeoutMs, (abort) => advisor.infer(context, abort));
      const verdict: LiveVerdict = {
        source: "LIVE",
        confidence: response.confidence,
        recommendation: response.recommendation,
        reasoning: response.reasoning,
        producedAt: new Date(this.clock()).toISOString()
      };
      this.cache.put(fingerprint, verdict);
      this.liveCalls += 1;
      return verdict;
    } catch (err) {
      this.logger.warn({ msg: "Advisor call failed, using rule-based verdict", symbol: signal.symbol, namespace: fingerprint.namespace, error: errorMessage(err) });
      return this.fallback(signal, "ADVISOR_FAILED");
    }
  }

  private fallback(signal: Signal, reason: FallbackReason): FallbackVerdict {
    this.fallbacks += 1;
    const confidence = Math.round(signal.strength * 100 * 100) / 100;
    const approve = signal.direction !== "NONE" && confidence >= this.policy.validationThreshold;
    return {
      source: "FALLBACK",
      reason,
      confidence,
      recommendation: approve ? "APPROVE" : "NEUTRAL",
      reasoning: `Rule-based verdict (${reason.toLowerCase().replace(/_/g, " ")}): ${signal.reasons.join("; ")}`,
      producedAt: new Date(this.clock()).toISOString()
    };
  }

  private contextFor(kind: SignalContext["kind"], signal: Signal): SignalContext {
    return {
      kind,
      symbol: signal.symbol,
      direction: signal.direction,
      strength: signal.strength,
      scores: signal.scores,
      reasons: signal.reasons,
      snapshot: signal.snapshot
    };
  }
}
