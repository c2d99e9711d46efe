import type { AppConfig } from "@tradewarden/shared";
import type { Logger } from "pino";

import { type Clock, systemClock } from "../runtime/clock";
import { AdvisoryCache } from "./advisory-cache";
import { AdvisoryService } from "./advisory.service";
import { OpenAiAdvisorClient } from "./openai-advisor.client";
import { QuotaGuard } from "./quota-guard";

/** One per process: the quota and the cache are only meaningful when shared by every symbol. */
export function createAdvisoryService(config: Pick<AppConfig, "trading" | "advisor">, logger: Logger, clock: Clock = systemClock): AdvisoryService {
  const { trading, advisor } = config;
  const cacheWindowMs = trading.aiCacheDurationMinutes * 60_000;
  const client =
    advisor.enabled && advisor.apiKey ? new OpenAiAdvisorClient({ apiKey: advisor.apiKey, model: advisor.model, baseUrl: advisor.baseUrl }) : null;

  return new AdvisoryService(
    {
      minimumSignalStrength: trading.minimumSignalStrength,
      validationThreshold: trading.validationThreshold,
      cacheWindowMs,
      advisorTimeoutMs: advisor.timeoutMs
    },
    new QuotaGuard(trading.aiDailyLimit, clock),
    new AdvisoryCache(cacheWindowMs, clock),
    client,
    logger.child({ component: "advisory" }),
    clock
  );
}
