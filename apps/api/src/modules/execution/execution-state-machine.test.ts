import { describe, expect, it } from "vitest";

import { IllegalTransitionError } from "@tradewarden/shared";

import type { ExecutionEvent, ExecutionState } from "./execution-state-machine";
import { transition } from "./execution-state-machine";

const intent = { symbol: "BTCUSDT", direction: "LONG", sizeUSD: 100, entryPrice: 100, stopLossPrice: 98, takeProfitPrice: 103 } as const;
const fill = { orderId: "paper-1", fillPrice: 100, filledAt: 0, fees: 0 };
const exit = { reason: "TAKE_PROFIT", price: 103, time: 3_600_000 } as const;
const close = { exitPrice: 103, closedAt: 3_600_000, fees: 0 };

describe("execution state machine", () => {
  it("walks a full entry and exit", () => {
    const steps: Array<[ExecutionState, ExecutionEvent, ExecutionState]> = [
      ["IDLE", { type: "BAR_RECEIVED" }, "EVALUATING"],
      ["EVALUATING", { type: "INTENT_ACCEPTED", intent }, "PENDING_ENTRY"],
      ["PENDING_ENTRY", { type: "FILL_CONFIRMED", intent, fill }, "OPEN"],
      ["OPEN", { type: "BAR_RECEIVED" }, "OPEN"],
      ["OPEN", { type: "EXIT_TRIGGERED", exit }, "CLOSING"],
      ["CLOSING", { type: "CLOSE_CONFIRMED", exit, close }, "IDLE"]
    ];
    for (const [from, event, to] of steps) {
      expect(transition(from, event).state).toBe(to);
    }
  });

  it("emits the effect the executor has to perform", () => {
    expect(transition("EVALUATING", { type: "INTENT_ACCEPTED", intent }).effects).toEqual([{ type: "PLACE_ORDER", intent }]);
    expect(transition("PENDING_ENTRY", { type: "FILL_CONFIRMED", intent, fill }).effects).toEqual([{ type: "RECORD_OPEN_TRADE", intent, fill }]);
    expect(transition("OPEN", { type: "EXIT_TRIGGERED", exit }).effects).toEqual([{ type: "CLOSE_POSITION", exit }]);
    expect(transition("CLOSING", { type: "CLOSE_CONFIRMED", exit, close }).effects).toEqual([{ type: "RECORD_CLOSED_TRADE", exit, close }]);
  });

  it("returns to IDLE on rejection and on a failed fill", () => {
    expect(transition("EVALUATING", { type: "INTENT_REJECTED", reason: "NO_DIRECTION" })).toEqual({
      state: "IDLE",
      effects: [{ type: "LOG_REJECTION", reason: "NO_DIRECTION" }]
    });
    expect(transition("PENDING_ENTRY", { type: "FILL_FAILED", reason: "timeout" }).state).toBe("IDLE");
  });

  it("keeps the position open when a close fails", () => {
    expect(transition("CLOSING", { type: "CLOSE_FAILED", reason: "exchange down" })).toEqual({
      state: "OPEN",
      effects: [{ type: "LOG_REJECTION", reason: "exchange down" }]
    });
  });

  it("throws on events the state does not accept", () => {
    expect(() => transition("IDLE", { type: "EXIT_TRIGGERED", exit })).toThrow(IllegalTransitionError);
    expect(() => transition("OPEN", { type: "INTENT_ACCEPTED", intent })).toThrow("Event INTENT_ACCEPTED is not allowed in state OPEN");
    expect(() => transition("PENDING_ENTRY", { type: "BAR_RECEIVED" })).toThrow(IllegalTransitionError);
    expect(() => transition("CLOSING", { type: "BAR_RECEIVED" })).toThrow(IllegalTransitionError);
  });
});
