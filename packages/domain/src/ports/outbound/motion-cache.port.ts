import type { MotionCacheEntry } from '../../entities/motion-cache-entry.js';

/** Staged view over the cache, valid only inside `transact`. */
export interface MotionCacheView {
  get(tagId: string): MotionCacheEntry | undefined;
  set(entry: MotionCacheEntry): void;
}

export interface MotionCachePort {
  /**
   * Runs `fn` with exclusive access to the cache. Writes made through the view
   * are applied when `fn` resolves and dropped when it rejects.
   */
  transact<T>(fn: (view: MotionCacheView) => Promise<T>): Promise<T>;
  get(tagId: string): MotionCacheEntry | undefined;
  reset(): void;
}
