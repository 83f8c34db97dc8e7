import type { CalibratedReading, StoredReading } from '../../entities/calibrated-reading.js';
import type { ProcessedRecord } from '../../entities/processed-record.js';
import type { ReportSession } from '../../entities/report-session.js';

export interface ReadingRepositoryPort {
  appendMany(readings: readonly CalibratedReading[]): Promise<StoredReading[]>;
}

export interface PositionRepositoryPort {
  appendMany(records: readonly ProcessedRecord[]): Promise<void>;
}

export interface NewReportSession {
  user: string;
  startedAt: Date;
  spanX: number | null;
  spanY: number | null;
}

/** Columns an update may touch; omitted keys are left as stored. */
export interface ReportSessionPatch {
  startedAt?: Date | null;
  endedAt?: Date | null;
  spanX?: number | null;
  spanY?: number | null;
}

export interface ReportSessionRepositoryPort {
  /**
   * Most recent session of `user` whose endedAt is null. Locks the user's
   * sessions until the surrounding transaction ends, so at most one open
   * session per user survives concurrent batches.
   */
  findOpenByUser(user: string): Promise<ReportSession | null>;
  insert(session: NewReportSession): Promise<ReportSession>;
  update(sessionId: number, patch: ReportSessionPatch): Promise<ReportSession>;
}

/** Repositories bound to one storage transaction. */
export interface IngestUnitOfWork {
  readonly readings: ReadingRepositoryPort;
  readonly positions: PositionRepositoryPort;
  readonly sessions: ReportSessionRepositoryPort;
}

export interface IngestStorePort {
  /** Commits when `fn` resolves, rolls back every write when it rejects. */
  transaction<T>(fn: (uow: IngestUnitOfWork) => Promise<T>): Promise<T>;
}
