import { DISTANCE_SLOT_COUNT } from '@uwb-locator/domain';
import type { RawReading, TelemetryPayload } from '@uwb-locator/domain';
import { TELEMETRY_FIELDS, decodeNumber, matchField } from './line-grammar.js';
import type { FieldSpec } from './line-grammar.js';

type FieldValues = {
  [K in keyof typeof TELEMETRY_FIELDS]: (typeof TELEMETRY_FIELDS)[K] extends FieldSpec<infer T>
    ? T | undefined
    : never;
};

function readField<T>(line: string, fieldSpec: FieldSpec<T>): T | undefined {
  const raw = matchField(line, fieldSpec);
  return raw === undefined ? undefined : fieldSpec.decode(raw);
}

function readFields(line: string): FieldValues {
  return {
    tagId: readField(line, TELEMETRY_FIELDS.tagId),
    range: readField(line, TELEMETRY_FIELDS.range),
    spanX: readField(line, TELEMETRY_FIELDS.spanX),
    spanY: readField(line, TELEMETRY_FIELDS.spanY),
    command: readField(line, TELEMETRY_FIELDS.command),
    sessionUser: readField(line, TELEMETRY_FIELDS.sessionUser),
  };
}

/** Pads with absent slots or truncates so there are exactly eight. */
export function toDistanceSlots(tokens: readonly (number | null)[]): (number | null)[] {
  return Array.from({ length: DISTANCE_SLOT_COUNT }, (_, i) => tokens[i] ?? null);
}

/**
 * Parses one telemetry line. Returns null when the tag id or the distance
 * list is missing; a bad numeric token only blanks its own slot.
 */
export function parseTelemetryLine(line: string, capturedAt: Date): RawReading | null {
  const fields = readFields(line);
  if (fields.tagId === undefined || fields.range === undefined) return null;

  return {
    tagId: fields.tagId,
    distances: toDistanceSlots(fields.range.map(decodeNumber)),
    spanX: fields.spanX ?? null,
    spanY: fields.spanY ?? null,
    command: fields.command ?? 0,
    sessionUser: fields.sessionUser,
    capturedAt,
  };
}

/** Normalizes a request payload into its non-blank lines. */
export function splitPayload(payload: TelemetryPayload): string[] {
  const lines = typeof payload === 'string' ? payload.split(/\r?\n|\r/) : payload;
  return lines.filter((line) => line.trim() !== '');
}
