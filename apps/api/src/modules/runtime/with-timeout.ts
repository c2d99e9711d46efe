import { TimeoutError } from "@tradewarden/shared";

/**
 * Races `work` against a timer. The timer is always cleared; the losing promise is left to settle on
 * its own and its rejection is observed so it never surfaces as unhandled.
 */
export async function withTimeout<T>(operation: string, timeoutMs: number, work: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  const pending = work(controller.signal);
  pending.catch(() => undefined);
  try {
    return await Promise.race([pending, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
