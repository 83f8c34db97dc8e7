import type { CalibratedReading, ResolvedPosition } from '@uwb-locator/domain';

export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface Anchor extends Point {
  readonly distance: number;
}

export const MIN_ANCHORS = 3;
export const SINGULAR_TOLERANCE = 1e-9;

/**
 * Anchor corners of the rectangle spanned by (spanX, spanY), in slot order
 * A0..A3. Slots 4-7 have no anchor position and are never solved.
 */
export function anchorLayout(spanX: number, spanY: number): Point[] {
  return [
    { x: 0, y: 0 },
    { x: spanX, y: 0 },
    { x: 0, y: spanY },
    { x: spanX, y: spanY },
  ];
}

/**
 * Pairs each corner with its slot's distance. A slot contributes only when its
 * value is present, is not the no-reading sentinel and is strictly positive.
 * Without two strictly positive spans there is no layout and no anchor.
 */
export function anchorsForReading(reading: CalibratedReading): Anchor[] {
  const { spanX, spanY } = reading;
  if (spanX === null || spanY === null || !(spanX > 0) || !(spanY > 0)) return [];

  const anchors: Anchor[] = [];
  anchorLayout(spanX, spanY).forEach((corner, slot) => {
    const distance = reading.distances[slot];
    if (distance === null || distance === undefined) return;
    if (reading.noReading[slot] || !(distance > 0)) return;
    anchors.push({ ...corner, distance });
  });
  return anchors;
}

/**
 * Multilateration by linearised least squares.
 *
 * The last anchor j is the reference. Subtracting its circle equation from
 * anchor i's gives one linear row
 *
 *   2(xi − xj)·x + 2(yi − yj)·y = (dj² − di²) + (xi² + yi²) − (xj² + yj²)
 *
 * The rows are folded into the 2×2 normal equations AᵀA·p = Aᵀb and solved
 * with the closed-form inverse: exact for three anchors, least squares beyond.
 * Returns null for fewer than three anchors or a (near-)singular system.
 */
export function solvePosition(anchors: readonly Anchor[]): Point | null {
  const ref = anchors[anchors.length - 1];
  if (!ref || anchors.length < MIN_ANCHORS) return null;

  const refNorm = ref.x * ref.x + ref.y * ref.y;
  let a11 = 0;
  let a12 = 0;
  let a22 = 0;
  let b1 = 0;
  let b2 = 0;

  for (const anchor of anchors.slice(0, -1)) {
    const ax = 2 * (anchor.x - ref.x);
    const ay = 2 * (anchor.y - ref.y);
    const rhs =
      ref.distance * ref.distance -
      anchor.distance * anchor.distance +
      (anchor.x * anchor.x + anchor.y * anchor.y) -
      refNorm;
    a11 += ax * ax;
    a12 += ax * ay;
    a22 += ay * ay;
    b1 += ax * rhs;
    b2 += ay * rhs;
  }

  const det = a11 * a22 - a12 * a12;
  if (!(Math.abs(det) >= SINGULAR_TOLERANCE)) return null;

  const x = (a22 * b1 - a12 * b2) / det;
  const y = (a11 * b2 - a12 * b1) / det;
  if (!Number.isFinite(x) || !Number.isFinite(y)) return null;
  return { x, y };
}

/** The reading's fix, stamped with its capture time; null when unsolvable. */
export function solveReading(reading: CalibratedReading): ResolvedPosition | null {
  const point = solvePosition(anchorsForReading(reading));
  if (!point) return null;
  return { tagId: reading.tagId, x: point.x, y: point.y, resolvedAt: reading.capturedAt };
}
