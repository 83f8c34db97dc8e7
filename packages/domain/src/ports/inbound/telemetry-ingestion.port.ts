import type { IngestSummary, ProcessingSummary } from '../../entities/ingest-summary.js';

// ---------------------------------------------------------------------------
// Inbound payloads
// ---------------------------------------------------------------------------

/** A multi-line string (split on line breaks) or a list of telemetry lines. */
export type TelemetryPayload = string | readonly string[];

/** Already-decoded telemetry accepted by the processing path. */
export interface StructuredReadingInput {
  tagId: string;
  distances: (number | null)[];
  kx?: number | null;
  ky?: number | null;
  cmd?: number;
  user?: string;
  /** Defaults to the time the batch is received. */
  capturedAt?: Date;
}

export type ProcessingInput =
  | { kind: 'lines'; payload: TelemetryPayload }
  | { kind: 'readings'; readings: readonly StructuredReadingInput[] };

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

export interface TelemetryIngestionPort {
  /** Store calibrated readings, then offer the committed rows downstream. */
  ingestRaw(payload: TelemetryPayload): Promise<IngestSummary>;
  /** Solve positions and store them with their motion delta. */
  ingestProcessed(input: ProcessingInput): Promise<ProcessingSummary>;
}
