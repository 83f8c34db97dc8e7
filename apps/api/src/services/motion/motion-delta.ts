import type { MotionCacheEntry, MotionCacheView, MotionDelta } from '@uwb-locator/domain';

export interface Fix {
  readonly x: number;
  readonly y: number;
  readonly at: Date;
}

/** Displacement and whole elapsed seconds since `prior`; (null, null) without one. */
export function computeMotionDelta(prior: MotionCacheEntry | undefined, fix: Fix): MotionDelta {
  if (!prior) return { distanceTravelled: null, elapsedSeconds: null };
  const distanceTravelled = Math.hypot(fix.x - prior.lastX, fix.y - prior.lastY);
  // Out-of-order or skewed timestamps clamp to zero.
  const elapsedMs = fix.at.getTime() - prior.lastTimestamp.getTime();
  const elapsedSeconds = Math.max(0, Math.floor(elapsedMs / 1_000));
  return { distanceTravelled, elapsedSeconds };
}

/** Reads the tag's last fix, computes the delta, then replaces the entry. */
export function updateMotion(view: MotionCacheView, tagId: string, fix: Fix): MotionDelta {
  const delta = computeMotionDelta(view.get(tagId), fix);
  view.set({ tagId, lastX: fix.x, lastY: fix.y, lastTimestamp: fix.at });
  return delta;
}
