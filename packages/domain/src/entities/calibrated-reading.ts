import type { DistanceSlots, RawReading } from './raw-reading.js';

/**
 * RawReading with the calibration offset subtracted from every present value.
 * `noReading[i]` is true where slot i equals the no-reading sentinel (0 − offset).
 */
export interface CalibratedReading extends RawReading {
  readonly distances: DistanceSlots;
  readonly noReading: readonly boolean[];
  readonly offset: number;
  /** Reserved calibration tag: counted, never solved, stored or forwarded. */
  readonly calibrationTag: boolean;
}

/** A calibrated reading as persisted by the storage collaborator. */
export interface StoredReading {
  readonly id: number;
  readonly tagId: string;
  readonly distances: DistanceSlots;
  readonly spanX: number | null;
  readonly spanY: number | null;
  readonly createdAt: Date;
}
