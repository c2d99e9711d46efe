import type { OrderIntent } from "@tradewarden/shared";
import { IllegalTransitionError } from "@tradewarden/shared";

import type { CloseConfirmation, ExitRequest, FillConfirmation } from "./execution.port";

export type ExecutionState = "IDLE" | "EVALUATING" | "PENDING_ENTRY" | "OPEN" | "CLOSING";

export type ExecutionEvent =
  | { type: "BAR_RECEIVED" }
  | { type: "INTENT_ACCEPTED"; intent: OrderIntent }
  | { type: "INTENT_REJECTED"; reason: string }
  | { type: "FILL_CONFIRMED"; intent: OrderIntent; fill: FillConfirmation }
  | { type: "FILL_FAILED"; reason: string }
  | { type: "EXIT_TRIGGERED"; exit: ExitRequest }
  | { type: "CLOSE_CONFIRMED"; exit: ExitRequest; close: CloseConfirmation }
  | { type: "CLOSE_FAILED"; reason: string };

export type ExecutionEffect =
  | { type: "PLACE_ORDER"; intent: OrderIntent }
  | { type: "RECORD_OPEN_TRADE"; intent: OrderIntent; fill: FillConfirmation }
  | { type: "CLOSE_POSITION"; exit: ExitRequest }
  | { type: "RECORD_CLOSED_TRADE"; exit: ExitRequest; close: CloseConfirmation }
  | { type: "LOG_REJECTION"; reason: string };

export type Transition = {
  state: ExecutionState;
  effects: ExecutionEffect[];
};

/**
 * Per-symbol position lifecycle. Pure: the caller performs the effects and feeds the outcome back
 * as the next event.
 */
export function transition(state: ExecutionState, event: ExecutionEvent): Transition {
  switch (state) {
    case "IDLE":
      if (event.type === "BAR_RECEIVED") return { state: "EVALUATING", effects: [] };
      break;
    case "EVALUATING":
      if (event.type === "INTENT_ACCEPTED") return { state: "PENDING_ENTRY", effects: [{ type: "PLACE_ORDER", intent: event.intent }] };
      if (event.type === "INTENT_REJECTED") return { state: "IDLE", effects: [{ type: "LOG_REJECTION", reason: event.reason }] };
      break;
    case "PENDING_ENTRY":
      if (event.type === "FILL_CONFIRMED") {
        return { state: "OPEN", effects: [{ type: "RECORD_OPEN_TRADE", intent: event.intent, fill: event.fill }] };
      }
      if (event.type === "FILL_FAILED") return { state: "IDLE", effects: [{ type: "LOG_REJECTION", reason: event.reason }] };
      break;
    case "OPEN":
      if (event.type === "BAR_RECEIVED") return { state: "OPEN", effects: [] };
      if (event.type === "EXIT_TRIGGERED") return { state: "CLOSING", effects: [{ type: "CLOSE_POSITION", exit: event.exit }] };
      break;
    case "CLOSING":
      if (event.type === "CLOSE_CONFIRMED") {
        return { state: "IDLE", effects: [{ type: "RECORD_CLOSED_TRADE", exit: event.exit, close: event.close }] };
      }
      // The position is still on the book; exits are re-checked on the next bar.
      if (event.type === "CLOSE_FAILED") return { state: "OPEN", effects: [{ type: "LOG_REJECTION", reason: event.reason }] };
      break;
  }
  throw new IllegalTransitionError(state, event.type);
}
