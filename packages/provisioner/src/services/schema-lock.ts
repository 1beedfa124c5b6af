/**
 * Schema Lock
 *
 * Serialises operations on the same schema within one process. Calls on
 * different schemas never wait on each other.
 *
 * @example
 * ```typescript
 * const lock = new SchemaLock();
 * await lock.withLock('tenant_acme', async () => {
 *   // only one unit of work for tenant_acme runs here at a time
 * });
 * ```
 *
 * @module packages/provisioner/services/schema-lock
 */

export class SchemaLock {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Runs work once every earlier holder of the key has finished
   */
  async withLock<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Whether any unit of work holds or waits on the key */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
