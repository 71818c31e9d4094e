// src/lib/fill/sessionQueue.ts
import pLimit, { type LimitFunction } from "p-limit";

/**
 * Keyed single-writer queue: work for the same key runs one at a time, in
 * submission order; different keys run concurrently. A key's limiter is
 * dropped as soon as nothing is running or waiting on it.
 */
export class KeyedQueue {
  private readonly limits = new Map<string, LimitFunction>();

  run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let limit = this.limits.get(key);
    if (!limit) {
      limit = pLimit(1);
      this.limits.set(key, limit);
    }
    const owned = limit;
    return owned(fn).finally(() => {
      if (owned.activeCount === 0 && owned.pendingCount === 0 && this.limits.get(key) === owned) {
        this.limits.delete(key);
      }
    });
  }

  /** Keys with work running or queued. */
  get size(): number {
    return this.limits.size;
  }
}
