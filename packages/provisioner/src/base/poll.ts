/**
 * Poll state machine used for every wait in the provisioning window.
 *
 *   waiting ──(interval elapsed)──▶ attempting ──(value)──────────▶ done
 *      ▲                                │
 *      └──(undefined / transient)───────┤
 *                                       └──(other error, or transient
 *                                           past the deadline)──▶ failed
 *
 * A poll without `deadlineMs` never gives up on its own.
 */

import { ProviderError, ProviderErrorType, toError } from "../utils/provider-utils";

export interface PollClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const realClock: PollClock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export type PollState = "waiting" | "attempting" | "done" | "failed";

export interface PollOptions {
  /** Human readable, used in timeout errors */
  description: string;
  intervalMs: number;
  /** Wall-clock budget measured from the start of the poll; omit for an unbounded poll */
  deadlineMs?: number;
  /** Sleep one interval before the first attempt */
  initialDelay?: boolean;
  /** Errors that mean "not yet"; anything else fails the poll immediately */
  isTransient?: (error: unknown) => boolean;
  clock?: PollClock;
  onStateChange?: (state: PollState, attempt: number) => void;
}

export class PollTimeoutError extends ProviderError {
  constructor(
    description: string,
    readonly elapsedMs: number,
    readonly attempts: number,
    readonly lastError?: Error,
  ) {
    super(
      `Timed out after ${elapsedMs}ms (${attempts} attempts) waiting for ${description}` +
        (lastError ? `: ${lastError.message}` : ""),
      ProviderErrorType.UNKNOWN,
      lastError,
    );
    this.name = "PollTimeoutError";
  }
}

/**
 * Run `attempt` until it yields a value.
 *
 * `attempt` returns the value when done, `undefined` when the condition does
 * not hold yet, or throws. Thrown errors accepted by `isTransient` are
 * retried like `undefined`; others propagate unchanged.
 */
export async function pollUntil<T>(
  attempt: () => Promise<T | undefined>,
  options: PollOptions,
): Promise<T> {
  const clock = options.clock ?? realClock;
  const isTransient = options.isTransient ?? (() => false);
  const notify = options.onStateChange ?? (() => undefined);
  const start = clock.now();
  let attempts = 0;
  let lastError: Error | undefined;

  if (options.initialDelay) {
    notify("waiting", attempts);
    await clock.sleep(options.intervalMs);
  }

  for (;;) {
    attempts += 1;
    notify("attempting", attempts);
    try {
      const value = await attempt();
      if (value !== undefined) {
        notify("done", attempts);
        return value;
      }
      lastError = undefined;
    } catch (error) {
      if (!isTransient(error)) {
        notify("failed", attempts);
        throw error;
      }
      lastError = toError(error);
    }

    const elapsed = clock.now() - start;
    if (options.deadlineMs !== undefined && elapsed >= options.deadlineMs) {
      notify("failed", attempts);
      throw new PollTimeoutError(options.description, elapsed, attempts, lastError);
    }

    notify("waiting", attempts);
    await clock.sleep(options.intervalMs);
  }
}

/**
 * Build an `isTransient` predicate from an explicit allow-list of provider error codes.
 */
export function transientCodes(codes: readonly string[]): (error: unknown) => boolean {
  return (error) => error instanceof Error && codes.includes(error.name);
}
