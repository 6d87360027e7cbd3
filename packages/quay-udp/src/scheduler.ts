// Scheduler on Node timers.

import type { Scheduler } from "@quay/core";

// Longest delay setTimeout honours; larger ones fire after 1 ms.
const MAX_TIMEOUT = 2 ** 31 - 1;

/**
 * `callAt` on top of `setTimeout`, timed against a monotonic clock.
 *
 * Callbacks cannot be cancelled one by one; `close` drops all of them at
 * shutdown and turns later `callAt` calls into no-ops, so that nothing keeps
 * the process alive.
 */
export class NodeScheduler implements Scheduler {
  private timers = new Set<ReturnType<typeof setTimeout>>();
  private closed = false;

  constructor(private readonly clock: () => number = () => performance.now()) {}

  now(): number {
    return this.clock();
  }

  callAt(when: number, callback: () => void): void {
    if (this.closed) return;
    const remaining = Math.max(0, when - this.now());
    const capped = remaining > MAX_TIMEOUT;
    const timer: ReturnType<typeof setTimeout> = setTimeout(
      () => {
        this.timers.delete(timer);
        if (capped) this.callAt(when, callback);
        else callback();
      },
      capped ? MAX_TIMEOUT : remaining,
    );
    this.timers.add(timer);
  }

  /** Number of callbacks that have not fired yet. */
  get pendingCount(): number {
    return this.timers.size;
  }

  close(): void {
    this.closed = true;
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }
}
