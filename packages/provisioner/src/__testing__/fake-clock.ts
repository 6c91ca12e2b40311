import type { PollClock } from "../base/poll";

/**
 * Deterministic clock: sleeping advances time instantly.
 */
export class FakeClock implements PollClock {
  readonly sleeps: number[] = [];

  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
