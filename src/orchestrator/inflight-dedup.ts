/**
 * In-flight request deduplication.
 *
 * When identical requests arrive concurrently (same key), later callers await
 * the first caller's promise instead of running the work again. The entry is
 * dropped as soon as the promise settles.
 */
export class InflightDedup<T> {
  private inflight = new Map<string, Promise<T>>();

  run(key: string, execute: () => Promise<T>): Promise<T> {
    const existing = this.inflight.get(key);
    if (existing) return existing;

    const promise = execute().finally(() => this.inflight.delete(key));
    this.inflight.set(key, promise);
    return promise;
  }

  has(key: string): boolean {
    return this.inflight.has(key);
  }

  /** Count of in-flight requests (for metrics/debugging) */
  get size(): number {
    return this.inflight.size;
  }
}
