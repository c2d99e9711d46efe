import type { AdvisorResponse } from "@tradewarden/shared";
import { AdvisorResponseSchema, AdvisorUnavailableError, errorMessage } from "@tradewarden/shared";

import type { AdvisorPort, SignalContext } from "./advisor.port";

export type OpenAiAdvisorOptions = {
  apiKey: string;
  model: string;
  baseUrl: string;
};

type ChatCompletionResponse = {
  choices?: Array<{ message?: { content?: string | null } }>;
};

const SYSTEM_PROMPT = [
  "You are a risk-aware crypto futures analyst reviewing a technical trading signal.",
  'Reply with a single JSON object: {"recommendation": "APPROVE" | "REJECT" | "NEUTRAL", "confidence": 0-100, "reasoning": string}.',
  "APPROVE only when trend, trend strength and momentum agree and the risk/reward is acceptable."
].join(" ");

function round(value: number, decimals: number): number {
  const pow = 10 ** decimals;
  return Math.round(value * pow) / pow;
}

export function buildPrompt(context: SignalContext): string {
  const s = context.snapshot;
  const lines = [
    context.kind === "SIGNAL_VALIDATION" ? "Validate this order before it is placed." : "Assess this market signal.",
    `Symbol: ${context.symbol} (${s.timeframe})`,
    `Direction: ${context.direction}, composite strength ${round(context.strength, 3)}`,
    `Sub-scores: trend ${round(context.scores.trend, 3)}, strength ${round(context.scores.strength, 3)}, momentum ${round(context.scores.momentum, 3)}`,
    `Close ${s.close}; EMA fast ${round(s.fastAvg, 4)}, EMA slow ${round(s.slowAvg, 4)}`,
    `ADX ${round(s.trendStrength, 2)}, RSI ${round(s.momentum, 2)}, ATR ${round(s.volatility, 4)} (${round(s.volatilityPct, 2)}%), volume ratio ${round(s.volumeRatio, 2)}`,
    `Reasons: ${context.reasons.join("; ")}`
  ];
  if (context.order) {
    const o = context.order;
    lines.push(`Order: ${o.sizeUSD} USD at ${o.entryPrice}, stop ${o.stopLossPrice}, target ${o.takeProfitPrice}`);
  }
  return lines.join("\n");
}

/**
 * Pulls the first JSON object out of the completion text and validates it.
 */
export function parseAdvisorContent(content: string): AdvisorResponse {
  const match = /\{[\s\S]*\}/.exec(content);
  if (!match) {
    throw new AdvisorUnavailableError("MALFORMED_RESPONSE", "Advisor reply contained no JSON object");
  }
  let raw: unknown;
  try {
    raw = JSON.parse(match[0]);
  } catch (err) {
    throw new AdvisorUnavailableError("MALFORMED_RESPONSE", `Advisor reply is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = AdvisorResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AdvisorUnavailableError("MALFORMED_RESPONSE", `Advisor reply failed validation: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }
  return parsed.data;
}

export class OpenAiAdvisorClient implements AdvisorPort {
  private readonly baseUrl: string;

  constructor(private readonly options: OpenAiAdvisorOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
  }

  async infer(context: SignalContext, signal: AbortSignal): Promise<AdvisorResponse> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${this.options.apiKey}`
        },
        body: JSON.stringify({
          model: this.options.model,
          temperature: 0,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: buildPrompt(context) }
          ]
        }),
        signal
      });
    } catch (err) {
      throw new AdvisorUnavailableError("NETWORK", `Advisor request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (res.status === 429) {
      throw new AdvisorUnavailableError("RATE_LIMITED", "Advisor provider rate limit reached");
    }
    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new AdvisorUnavailableError("HTTP_ERROR", `Advisor HTTP ${res.status}: ${text.slice(0, 250)}`);
    }

    let body: ChatCompletionResponse;
    try {
      body = (await res.json()) as ChatCompletionResponse;
    } catch (err) {
      throw new AdvisorUnavailableError("MALFORMED_RESPONSE", "Advisor response body is not JSON", { cause: err });
    }
    const content = body.choices?.[0]?.message?.content;
    if (!content) {
      throw new AdvisorUnavailableError("MALFORMED_RESPONSE", "Advisor response has no message content");
    }
    return parseAdvisorContent(content);
  }
}
