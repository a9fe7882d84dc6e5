/**
 * Spaces out model requests so that no more than `qps` start per second.
 * Callers are served in arrival order.
 */

import { CancelledError } from "../../errors/jobErrors.js";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError(signal.reason));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export class RateLimiter {
  private readonly intervalMs: number;
  private nextSlot = 0;

  constructor(
    qps: number,
    private readonly now: () => number = Date.now,
    private readonly wait: Sleep = sleep
  ) {
    if (!(qps > 0)) {
      throw new RangeError(`qps must be greater than 0 (got ${qps})`);
    }
    this.intervalMs = 1000 / qps;
  }

  /**
   * Resolve when the caller may start its request.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    const current = this.now();
    const slot = Math.max(current, this.nextSlot);
    this.nextSlot = slot + this.intervalMs;

    const delay = slot - current;
    if (delay > 0) {
      await this.wait(delay, signal);
    }
  }
}
