/**
 * Readiness polling with exponential backoff and an explicit deadline.
 * Used wherever the deployment has to wait on an external service
 * (container health, database, the web endpoint).
 */
import { setTimeout as delay } from "node:timers/promises";

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await delay(ms);
  },
};

export interface WaitOptions {
  /** Give up after this long (ms). */
  timeoutMs: number;
  /** First delay between polls (default: 1000) */
  baseDelayMs?: number;
  /** Upper bound for a single delay (default: 10000) */
  maxDelayMs?: number;
  clock?: Clock;
  /** Called before each sleep; useful for spinner messages */
  onPoll?: (attempt: number, nextDelayMs: number) => void;
}

export class WaitTimeoutError extends Error {
  readonly attempts: number;

  constructor(message: string, attempts: number) {
    super(message);
    this.name = "WaitTimeoutError";
    this.attempts = attempts;
  }
}

/**
 * Poll `probe` until it resolves true. Errors thrown by the probe end the
 * wait immediately; a false result is retried until the deadline.
 *
 * @throws WaitTimeoutError when the deadline passes first
 */
export async function waitFor(
  description: string,
  probe: () => Promise<boolean>,
  options: WaitOptions
): Promise<number> {
  const clock = options.clock ?? systemClock;
  const baseDelayMs = options.baseDelayMs ?? 1000;
  const maxDelayMs = options.maxDelayMs ?? 10000;
  const deadline = clock.now() + options.timeoutMs;

  for (let attempt = 1; ; attempt++) {
    if (await probe()) return attempt;

    const remaining = deadline - clock.now();
    if (remaining <= 0) {
      throw new WaitTimeoutError(
        `Timed out after ${Math.round(options.timeoutMs / 1000)}s waiting for ${description}`,
        attempt
      );
    }

    const backoff = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
    const delayMs = Math.min(backoff, remaining);
    options.onPoll?.(attempt, delayMs);
    await clock.sleep(delayMs);
  }
}
