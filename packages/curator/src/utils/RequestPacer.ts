/**
 * Request Pacer
 * - Enforces a minimum interval between consecutive outbound requests
 * - Monotonic timing via performance.now()
 * - Blocking wait; one pacer is shared by every request of one client
 * - Clock and sleep are injectable so tests never wait on real timers
 */

export type Sleep = (ms: number) => Promise<void>;

export interface PacerOptions {
  minIntervalMs?: number; // default 1000
  now?: () => number;     // monotonic clock in ms, default performance.now
  sleep?: Sleep;
}

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export class RequestPacer {
  private lastRequestAt: null | number = null;
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleepFn: Sleep;

  constructor(opts: PacerOptions = {}) {
    this.minIntervalMs = Math.max(0, opts.minIntervalMs ?? 1000);
    this.now = opts.now ?? (() => performance.now());
    this.sleepFn = opts.sleep ?? sleep;
  }

  get interval(): number {
    return this.minIntervalMs;
  }

  /**
   * Wait until the next request may go out, then claim the slot.
   * Returns how long the caller was held back, in ms.
   */
  async acquire(): Promise<number> {
    let waited = 0;
    if (this.lastRequestAt !== null) {
      const remaining = this.minIntervalMs - (this.now() - this.lastRequestAt);
      if (remaining > 0) {
        await this.sleepFn(remaining);
        waited = remaining;
      }
    }
    this.lastRequestAt = this.now();
    return waited;
  }

  reset(): void {
    this.lastRequestAt = null;
  }
}
