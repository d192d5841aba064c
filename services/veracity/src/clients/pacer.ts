export type WaitFn = (ms: number) => Promise<void>;
export type ClockFn = () => number;

export const sleep: WaitFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Spaces out request starts against one external authority so that two
 * consecutive calls are never closer than `intervalMs`. Concurrent callers
 * are queued by reserving successive time slots.
 */
export class RequestPacer {
  private nextSlotAt = 0;

  constructor(
    private readonly intervalMs: number,
    private readonly wait: WaitFn = sleep,
    private readonly now: ClockFn = Date.now,
  ) {}

  async pace(): Promise<void> {
    if (this.intervalMs <= 0) {
      return;
    }
    const now = this.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.intervalMs;
    const delay = slot - now;
    if (delay > 0) {
      await this.wait(delay);
    }
  }
}
