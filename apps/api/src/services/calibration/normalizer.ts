import type { CalibratedReading, RawReading } from '@uwb-locator/domain';

/** Absolute tolerance when comparing a calibrated value against the sentinel. */
export const NO_READING_TOLERANCE = 1e-9;

export interface CalibrationOptions {
  /** Subtracted from every present distance and span value. */
  readonly offset: number;
  /** Reserved tag ids whose readings are calibration-only. */
  readonly calibrationTagIds: ReadonlySet<string>;
}

/** The value a raw zero ("no reading") takes after calibration. */
export function noReadingSentinel(offset: number): number {
  return 0 - offset;
}

export function isNoReading(value: number, offset: number): boolean {
  return Math.abs(value - noReadingSentinel(offset)) <= NO_READING_TOLERANCE;
}

function subtract(value: number | null, offset: number): number | null {
  return value === null ? null : value - offset;
}

export function normalizeReading(raw: RawReading, opts: CalibrationOptions): CalibratedReading {
  const { offset } = opts;
  const distances = raw.distances.map((d) => subtract(d, offset));
  return {
    ...raw,
    distances,
    noReading: distances.map((d) => d !== null && isNoReading(d, offset)),
    spanX: subtract(raw.spanX, offset),
    spanY: subtract(raw.spanY, offset),
    offset,
    calibrationTag: opts.calibrationTagIds.has(raw.tagId),
  };
}
