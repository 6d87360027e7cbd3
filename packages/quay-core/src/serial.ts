// Per-key serialization of async work.

/**
 * Runs the work submitted for one key strictly one after another.
 *
 * Work for different keys is not ordered. A failed job rejects its own
 * promise and does not stop later jobs for the same key.
 */
export class SerialQueue<K extends object> {
  private tails = new WeakMap<K, Promise<void>>();

  run<T>(key: K, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(work);
    this.tails.set(
      key,
      result.then(
        () => undefined,
        () => undefined,
      ),
    );
    return result;
  }
}
