import { afterEach, describe, expect, it, vi } from "vitest";

import { TimeoutError } from "@tradewarden/shared";

import { withTimeout } from "./with-timeout";

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the result when work settles in time", async () => {
    await expect(withTimeout("ping", 1_000, async () => "pong")).resolves.toBe("pong");
  });

  it("rejects with TimeoutError and aborts the signal", async () => {
    vi.useFakeTimers();
    let seen: AbortSignal | undefined;
    const promise = withTimeout("slow call", 250, (signal) => {
      seen = signal;
      return new Promise<string>(() => undefined);
    });
    const assertion = expect(promise).rejects.toThrow(new TimeoutError("slow call", 250));
    await vi.advanceTimersByTimeAsync(250);
    await assertion;
    expect(seen?.aborted).toBe(true);
  });

  it("passes work failures through", async () => {
    await expect(
      withTimeout("boom", 1_000, async () => {
        throw new Error("exchange down");
      })
    ).rejects.toThrow("exchange down");
  });
});
