import type {
  CalibratedReading,
  ClockPort,
  IngestStorePort,
  IngestSummary,
  IngestPath,
  IngestUnitOfWork,
  MotionCachePort,
  PositionPublisherPort,
  ProcessedRecord,
  ProcessingInput,
  ProcessingSummary,
  RawReading,
  ReadingForwarderPort,
  StoredReading,
  StructuredReadingInput,
  TelemetryIngestionPort,
  TelemetryPayload,
} from '@uwb-locator/domain';
import { ReportCommand } from '@uwb-locator/domain';
import { parseTelemetryLine, splitPayload, toDistanceSlots } from '../telemetry/line-parser.js';
import { normalizeReading } from '../calibration/normalizer.js';
import type { CalibrationOptions } from '../calibration/normalizer.js';
import { applySessionCommand } from '../reports/report-session.machine.js';
import { solveReading } from '../positioning/position-solver.js';
import { updateMotion } from '../motion/motion-delta.js';
import { EmptyBatchError, StorageError } from './errors.js';

export interface IngestionServiceDeps {
  store: IngestStorePort;
  forwarder: ReadingForwarderPort;
  motionCache: MotionCachePort;
  clock: ClockPort;
  calibration: CalibrationOptions;
  publisher?: PositionPublisherPort;
}

type Counters = {
  -readonly [K in Exclude<keyof IngestSummary, 'forwardedOk' | 'offset'>]: IngestSummary[K];
};

/** A parsed item, or null for a line that failed to parse. */
type BatchItem = RawReading | null;

export class IngestionService implements TelemetryIngestionPort {
  constructor(private readonly deps: IngestionServiceDeps) {}

  async ingestRaw(payload: TelemetryPayload): Promise<IngestSummary> {
    const lines = splitPayload(payload);
    if (lines.length === 0) throw new EmptyBatchError();

    const now = this.deps.clock.now();
    const counters = emptyCounters(lines.length);
    const items = lines.map((line) => parseTelemetryLine(line, now));

    const stored = await this.commit((uow) => this.storeReadings(items, uow, counters, now));

    let forwardedOk: boolean | null = null;
    if (stored.length > 0) {
      forwardedOk = await this.deps.forwarder.forward(stored).catch((err: unknown) => {
        console.warn('[ingest] forwarder rejected', err);
        return false;
      });
    }

    const summary: IngestSummary = { ...counters, forwardedOk, offset: this.deps.calibration.offset };
    logSummary('raw', summary);
    return summary;
  }

  async ingestProcessed(input: ProcessingInput): Promise<ProcessingSummary> {
    const now = this.deps.clock.now();
    const items: BatchItem[] =
      input.kind === 'lines'
        ? splitPayload(input.payload).map((line) => parseTelemetryLine(line, now))
        : input.readings.map((r) => fromStructured(r, now));
    if (items.length === 0) throw new EmptyBatchError();

    const counters = emptyCounters(items.length);
    const positions = await this.deps.motionCache
      .transact((view) =>
        this.commit(async (uow) => {
          const records: ProcessedRecord[] = [];
          for (const item of items) {
            const reading = await this.admit(item, uow, counters, now);
            if (!reading) continue;
            const fix = solveReading(reading);
            if (!fix) {
              counters.skippedUnsolvable += 1;
              continue;
            }
            const delta = updateMotion(view, fix.tagId, { x: fix.x, y: fix.y, at: fix.resolvedAt });
            records.push({ tagId: fix.tagId, x: fix.x, y: fix.y, ...delta, recordedAt: fix.resolvedAt });
          }
          await uow.positions.appendMany(records);
          counters.saved = records.length;
          return records;
        }),
      );

    if (positions.length > 0 && this.deps.publisher) {
      this.deps.publisher
        .publishPositions(positions)
        .catch((err: unknown) => console.error('[ingest] position broadcast failed', err));
    }

    const summary: ProcessingSummary = {
      ...counters,
      forwardedOk: null,
      offset: this.deps.calibration.offset,
      positions,
    };
    logSummary('processing', summary);
    return summary;
  }

  private async storeReadings(
    items: readonly BatchItem[],
    uow: IngestUnitOfWork,
    counters: Counters,
    now: Date,
  ): Promise<StoredReading[]> {
    const eligible: CalibratedReading[] = [];
    for (const item of items) {
      const reading = await this.admit(item, uow, counters, now);
      if (reading) eligible.push(reading);
    }
    const stored = await uow.readings.appendMany(eligible);
    counters.saved = stored.length;
    return stored;
  }

  /**
   * Calibrates one item, drives the session machine and applies the storage
   * eligibility rules. Returns the reading only if it may be stored.
   */
  private async admit(
    item: BatchItem,
    uow: IngestUnitOfWork,
    counters: Counters,
    now: Date,
  ): Promise<CalibratedReading | null> {
    if (!item) {
      counters.skippedInvalid += 1;
      return null;
    }
    const reading = normalizeReading(item, this.deps.calibration);

    const outcome = await applySessionCommand(reading, uow.sessions, now);
    if (outcome === 'opened' || outcome === 'updated') counters.sessionsOpenedOrUpdated += 1;
    if (outcome === 'closed') counters.sessionsClosed += 1;

    if (reading.calibrationTag) {
      counters.skippedCalibration += 1;
      return null;
    }
    if (reading.command === ReportCommand.DISCARD) {
      counters.skippedCommandZero += 1;
      return null;
    }
    return reading;
  }

  private async commit<T>(fn: (uow: IngestUnitOfWork) => Promise<T>): Promise<T> {
    try {
      return await this.deps.store.transaction(fn);
    } catch (err) {
      console.error('[ingest] batch rolled back', err);
      throw new StorageError(err);
    }
  }
}

function emptyCounters(receivedLines: number): Counters {
  return {
    receivedLines,
    saved: 0,
    skippedInvalid: 0,
    skippedCalibration: 0,
    skippedCommandZero: 0,
    skippedUnsolvable: 0,
    sessionsOpenedOrUpdated: 0,
    sessionsClosed: 0,
  };
}

/** Structured input is already decoded; it joins the pipeline after parsing. */
function fromStructured(input: StructuredReadingInput, now: Date): RawReading | null {
  const tagId = input.tagId.trim();
  if (!/^\d+$/.test(tagId)) return null;
  return {
    tagId,
    distances: toDistanceSlots(
      input.distances.map((d) => (d !== null && Number.isFinite(d) ? d : null)),
    ),
    spanX: input.kx ?? null,
    spanY: input.ky ?? null,
    command: input.cmd ?? 0,
    sessionUser: input.user,
    capturedAt: input.capturedAt ?? now,
  };
}

function logSummary(path: IngestPath, s: IngestSummary): void {
  console.log(
    `[ingest] ${path} batch: received=${s.receivedLines} saved=${s.saved} ` +
      `invalid=${s.skippedInvalid} calibration=${s.skippedCalibration} ` +
      `cmd0=${s.skippedCommandZero} unsolvable=${s.skippedUnsolvable} ` +
      `sessions+=${s.sessionsOpenedOrUpdated} sessions-=${s.sessionsClosed} ` +
      `forwarded=${s.forwardedOk ?? 'n/a'}`,
  );
}
