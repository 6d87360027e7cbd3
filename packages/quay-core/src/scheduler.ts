// Scheduler primitives the dispatcher runs on.

export interface Scheduler {
  /** Monotonic time in milliseconds, used for every engine call. */
  now(): number;

  /**
   * Run `callback` once, at or after `when`.
   *
   * There is no way to cancel it; callers must check on firing whether the
   * work is still wanted.
   */
  callAt(when: number, callback: () => void): void;
}
