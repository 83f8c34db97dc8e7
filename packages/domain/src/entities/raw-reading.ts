/** Number of distance slots carried by every reading (anchors A0..A7). */
export const DISTANCE_SLOT_COUNT = 8;

/** One distance per anchor slot; `null` means the slot carried no usable value. */
export type DistanceSlots = readonly (number | null)[];

/** A telemetry line after parsing, before calibration. */
export interface RawReading {
  readonly tagId: string;
  readonly distances: DistanceSlots;
  readonly spanX: number | null;
  readonly spanY: number | null;
  /** Inline command code; 0 when the line carries none. */
  readonly command: number;
  readonly sessionUser?: string;
  readonly capturedAt: Date;
}
