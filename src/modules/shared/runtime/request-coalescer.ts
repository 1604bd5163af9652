/**
 * REQUEST COALESCER
 * =================
 *
 * Anti-stampede: concurrent requests for the same key share one promise.
 * A table of 20 rows asking for the same FX series makes one provider call.
 */

export class RequestCoalescer<T> {
  private inflight = new Map<string, Promise<T>>();

  /**
   * Run `fn` unless the same key is already running, in which case the
   * pending promise is returned.
   */
  run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inflight.get(key);
    if (existing) {
      return existing;
    }

    const p = (async () => {
      try {
        return await fn();
      } finally {
        this.inflight.delete(key);
      }
    })();

    this.inflight.set(key, p);
    return p;
  }

  isInFlight(key: string): boolean {
    return this.inflight.has(key);
  }

  size(): number {
    return this.inflight.size;
  }
}
