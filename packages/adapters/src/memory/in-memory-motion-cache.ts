import type { MotionCacheEntry, MotionCachePort, MotionCacheView } from '@uwb-locator/domain';

/**
 * Process-lifetime motion cache guarded by a whole-map lock.
 *
 * `transact` callers run one at a time in arrival order. Writes are staged and
 * applied only if the callback resolves, so a failed batch leaves every tag's
 * last fix as it was.
 */
export class InMemoryMotionCache implements MotionCachePort {
  private readonly entries = new Map<string, MotionCacheEntry>();
  private tail: Promise<void> = Promise.resolve();

  get(tagId: string): MotionCacheEntry | undefined {
    return this.entries.get(tagId);
  }

  get size(): number {
    return this.entries.size;
  }

  reset(): void {
    this.entries.clear();
  }

  transact<T>(fn: (view: MotionCacheView) => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      const staged = new Map<string, MotionCacheEntry>();
      const view: MotionCacheView = {
        get: (tagId) => staged.get(tagId) ?? this.entries.get(tagId),
        set: (entry) => {
          staged.set(entry.tagId, entry);
        },
      };
      const result = await fn(view);
      for (const [tagId, entry] of staged) {
        this.entries.set(tagId, entry);
      }
      return result;
    });
    // Keep the queue moving whether or not this holder failed.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
