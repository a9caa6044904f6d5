import { setTimeout as delay } from "node:timers/promises";
import { errorMessage } from "@bedrock-herald/shared";

export interface LoopOptions {
  /** Wait one interval before the first run. */
  initialDelay?: boolean;
  /** Wait used after a failed iteration instead of the interval. */
  errorDelayMs?: number;
}

/** Sleep unless aborted; `false` when the signal fired. */
async function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (err) {
    if (signal.aborted) return false;
    throw err;
  }
}

/**
 * Run `iteration` repeatedly until `signal` aborts. A failed iteration is
 * logged and the loop carries on. The signal is checked between iterations,
 * never inside one.
 */
export async function runLoop(
  name: string,
  intervalMs: number,
  signal: AbortSignal,
  iteration: () => Promise<unknown>,
  options: LoopOptions = {},
): Promise<void> {
  let wait = options.initialDelay ? intervalMs : 0;

  while (!signal.aborted) {
    if (!(await sleep(wait, signal))) break;

    try {
      await iteration();
      wait = intervalMs;
    } catch (err) {
      if (signal.aborted) break;
      console.error(`[MONITOR] ${name} failed: ${errorMessage(err)}`);
      wait = options.errorDelayMs ?? intervalMs;
    }
  }
}
