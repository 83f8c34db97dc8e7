/** A solved fix, not yet stored. */
export interface ResolvedPosition {
  readonly tagId: string;
  readonly x: number;
  readonly y: number;
  readonly resolvedAt: Date;
}

/** A resolved fix plus the motion delta against the tag's previous fix. */
export interface ProcessedRecord {
  readonly tagId: string;
  readonly x: number;
  readonly y: number;
  /** null on the tag's first fix since process start */
  readonly distanceTravelled: number | null;
  /** whole seconds, null on the tag's first fix since process start */
  readonly elapsedSeconds: number | null;
  readonly recordedAt: Date;
}
