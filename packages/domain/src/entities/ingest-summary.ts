import type { ProcessedRecord } from './processed-record.js';

export type IngestPath = 'raw' | 'processing';

/** Counters returned to the caller for one ingested batch. */
export interface IngestSummary {
  readonly receivedLines: number;
  readonly saved: number;
  readonly skippedInvalid: number;
  readonly skippedCalibration: number;
  readonly skippedCommandZero: number;
  readonly skippedUnsolvable: number;
  readonly sessionsOpenedOrUpdated: number;
  readonly sessionsClosed: number;
  /** null when nothing was offered downstream (processing path, or no rows stored) */
  readonly forwardedOk: boolean | null;
  readonly offset: number;
}

export interface ProcessingSummary extends IngestSummary {
  readonly positions: ProcessedRecord[];
}
