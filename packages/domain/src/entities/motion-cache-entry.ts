/** Last resolved fix of a tag. Process-lifetime only, never persisted. */
export interface MotionCacheEntry {
  readonly tagId: string;
  readonly lastX: number;
  readonly lastY: number;
  readonly lastTimestamp: Date;
}

export interface MotionDelta {
  readonly distanceTravelled: number | null;
  readonly elapsedSeconds: number | null;
}
