import { afterEach, describe, expect, it, vi } from "vitest";

import { AdvisorUnavailableError } from "@tradewarden/shared";

import { makeSignal } from "../../testing/signals";
import type { SignalContext } from "./advisor.port";
import { OpenAiAdvisorClient, buildPrompt, parseAdvisorContent } from "./openai-advisor.client";

function contextFor(kind: SignalContext["kind"]): SignalContext {
  const signal = makeSignal({ strength: 0.8 });
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

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

const client = new OpenAiAdvisorClient({ apiKey: "test-secret", model: "gpt-4o-mini", baseUrl: "https://advisor.test/v1/" });

describe("parseAdvisorContent", () => {
  it("extracts the JSON object from surrounding prose", () => {
    expect(parseAdvisorContent('Sure:\n{"recommendation": " approve ", "confidence": "77"}\nDone.')).toEqual({
      recommendation: "APPROVE",
      confidence: 77,
      reasoning: ""
    });
  });

  it("flags replies without a usable object as malformed", () => {
    expect(() => parseAdvisorContent("no opinion")).toThrow("Advisor reply contained no JSON object");
    expect(() => parseAdvisorContent('{"recommendation": "BUY", "confidence": 50}')).toThrow(AdvisorUnavailableError);
    expect(() => parseAdvisorContent('{"recommendation": "APPROVE", "confidence": 150}')).toThrow(AdvisorUnavailableError);
  });
});

describe("buildPrompt", () => {
  it("describes the order only for validation requests", () => {
    const primary = buildPrompt(contextFor("MARKET_ANALYSIS"));
    const validation = buildPrompt({
      ...contextFor("SIGNAL_VALIDATION"),
      order: { sizeUSD: 100, entryPrice: 100, stopLossPrice: 98, takeProfitPrice: 103 }
    });

    expect(primary.split("\n")[0]).toBe("Assess this market signal.");
    expect(primary.split("\n")[1]).toBe("Symbol: BTCUSDT (1h)");
    expect(primary).not.toContain("Order:");
    expect(validation.split("\n")[0]).toBe("Validate this order before it is placed.");
    expect(validation.split("\n").at(-1)).toBe("Order: 100 USD at 100, stop 98, target 103");
  });
});

describe("OpenAiAdvisorClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts a chat completion and parses the reply", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({ choices: [{ message: { content: '{"recommendation":"REJECT","confidence":64,"reasoning":"late entry"}' } }] })
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await client.infer(contextFor("MARKET_ANALYSIS"), new AbortController().signal);

    expect(result).toEqual({ recommendation: "REJECT", confidence: 64, reasoning: "late entry" });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://advisor.test/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toMatchObject({ authorization: "Bearer test-secret" });
  });

  it("maps HTTP 429 to a rate limit failure", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ error: "slow down" }, 429)));

    await expect(client.infer(contextFor("MARKET_ANALYSIS"), new AbortController().signal)).rejects.toMatchObject({ kind: "RATE_LIMITED" });
  });

  it("maps other HTTP failures and network errors", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("upstream broke", { status: 502 })));
    await expect(client.infer(contextFor("MARKET_ANALYSIS"), new AbortController().signal)).rejects.toThrow("Advisor HTTP 502: upstream broke");

    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );
    await expect(client.infer(contextFor("MARKET_ANALYSIS"), new AbortController().signal)).rejects.toMatchObject({ kind: "NETWORK" });
  });

  it("treats a reply without content as malformed", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ choices: [] })));

    await expect(client.infer(contextFor("MARKET_ANALYSIS"), new AbortController().signal)).rejects.toMatchObject({ kind: "MALFORMED_RESPONSE" });
  });
});
