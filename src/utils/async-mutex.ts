/**
 * Promise-chain mutual exclusion for serializing async work inside one
 * Node.js process.
 *
 * @packageDocumentation
 */

/**
 * An async lock. Callers queue in arrival order; each critical section starts
 * only after the previous one settles, whether it resolved or rejected.
 *
 * @example
 * ```typescript
 * const mutex = new AsyncMutex();
 * const saved = await mutex.runExclusive(async () => {
 *   const rows = await store.readAll();
 *   await store.append(next);
 *   return rows.length + 1;
 * });
 * ```
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Runs `fn` while holding the lock.
   *
   * @param fn - The critical section.
   * @returns Whatever `fn` resolves to.
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.tail;
    this.tail = gate;

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
