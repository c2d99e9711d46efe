import type { QuotaState } from "@tradewarden/shared";
import { utcDateKey } from "@tradewarden/shared";

import { type Clock, systemClock } from "../runtime/clock";

/**
 * Daily budget for advisor calls. `tryConsume` is synchronous, so on the event loop it is the single
 * point where the check and the increment happen together.
 */
export class QuotaGuard {
  private callsToday = 0;
  private windowStartDate: string;

  constructor(
    private readonly limit: number,
    private readonly clock: Clock = systemClock
  ) {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new Error(`Daily limit must be a non-negative integer, got ${limit}`);
    }
    this.windowStartDate = utcDateKey(this.clock());
  }

  tryConsume(): boolean {
    this.rollOver();
    if (this.callsToday >= this.limit) return false;
    this.callsToday += 1;
    return true;
  }

  remaining(): number {
    this.rollOver();
    return Math.max(0, this.limit - this.callsToday);
  }

  snapshot(): QuotaState {
    this.rollOver();
    return { callsToday: this.callsToday, limit: this.limit, windowStartDate: this.windowStartDate };
  }

  private rollOver(): void {
    const today = utcDateKey(this.clock());
    if (today !== this.windowStartDate) {
      this.callsToday = 0;
      this.windowStartDate = today;
    }
  }
}
