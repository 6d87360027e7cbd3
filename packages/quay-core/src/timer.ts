// One live wake-up per connection on top of a scheduler without cancellation.
//
// Each call to `schedule` starts a new generation for its key. Callbacks of
// older generations still fire but do nothing. Work a callback defers must
// check `isCurrent` again before acting.

import { logTimer } from "./logging.ts";
import type { Scheduler } from "./scheduler.ts";

export class TimerScheduler<K extends object> {
  private generations = new WeakMap<K, number>();

  constructor(private readonly scheduler: Scheduler) {}

  /**
   * Replace the pending wake-up for `key` with one at `deadline`.
   *
   * A `null` deadline only invalidates the pending wake-up. Returns whether a
   * callback was registered.
   */
  schedule(key: K, deadline: number | null, fire: (generation: number) => void): boolean {
    const generation = this.bump(key);
    if (deadline === null) return false;

    this.scheduler.callAt(deadline, () => {
      if (!this.isCurrent(key, generation)) {
        logTimer("stale wake-up for %d ignored", deadline);
        return;
      }
      fire(generation);
    });
    return true;
  }

  /** Whether `generation` is still the latest one scheduled for `key`. */
  isCurrent(key: K, generation: number): boolean {
    return this.generations.get(key) === generation;
  }

  /** Make the pending wake-up for `key`, if any, a no-op. */
  invalidate(key: K): void {
    this.bump(key);
  }

  private bump(key: K): number {
    const generation = (this.generations.get(key) ?? 0) + 1;
    this.generations.set(key, generation);
    return generation;
  }
}
