import type {
  CalibratedReading,
  IngestStorePort,
  IngestUnitOfWork,
  NewReportSession,
  PositionPublisherPort,
  ProcessedRecord,
  ReadingForwarderPort,
  ReportSession,
  ReportSessionPatch,
  StoredReading,
} from '@uwb-locator/domain';

interface Tables {
  readings: StoredReading[];
  positions: ProcessedRecord[];
  sessions: ReportSession[];
}

/**
 * In-process stand-in for the PostgreSQL store.
 *
 * A transaction reads committed rows plus its own writes and publishes its
 * writes only when the callback resolves, as READ COMMITTED does. Looking up
 * a user's open session holds that user's lock until the transaction ends,
 * like the advisory lock the pg repository takes.
 */
export class InMemoryIngestStore implements IngestStorePort {
  tables: Tables = { readings: [], positions: [], sessions: [] };
  /** When set, the next transaction fails at its final write. */
  failNextCommit: Error | null = null;
  private nextReadingId = 1;
  private nextSessionId = 1;
  private readonly userLocks = new Map<string, Promise<void>>();

  async transaction<T>(fn: (uow: IngestUnitOfWork) => Promise<T>): Promise<T> {
    const draft: Tables = { readings: [], positions: [], sessions: [] };
    const updated = new Map<number, ReportSession>();
    const lockedUsers = new Set<string>();
    const releases: (() => void)[] = [];

    const visibleSessions = (): ReportSession[] => [
      ...this.tables.sessions.map((s) => updated.get(s.sessionId) ?? s),
      ...draft.sessions,
    ];

    const uow: IngestUnitOfWork = {
      readings: {
        appendMany: async (rows: readonly CalibratedReading[]) => {
          this.throwIfFailing();
          const stored = rows.map(
            (r): StoredReading => ({
              id: this.nextReadingId++,
              tagId: r.tagId,
              distances: r.distances,
              spanX: r.spanX,
              spanY: r.spanY,
              createdAt: r.capturedAt,
            }),
          );
          draft.readings.push(...stored);
          return stored;
        },
      },
      positions: {
        appendMany: async (records: readonly ProcessedRecord[]) => {
          this.throwIfFailing();
          draft.positions.push(...records);
        },
      },
      sessions: {
        findOpenByUser: async (user: string) => {
          if (!lockedUsers.has(user)) {
            lockedUsers.add(user);
            releases.push(await this.lockUser(user));
          }
          const open = visibleSessions().filter((s) => s.user === user && s.endedAt === null);
          return open[open.length - 1] ?? null;
        },
        insert: async (session: NewReportSession) => {
          const row: ReportSession = { sessionId: this.nextSessionId++, endedAt: null, ...session };
          draft.sessions.push(row);
          return row;
        },
        update: async (id: number, patch: ReportSessionPatch) => {
          const current = visibleSessions().find((s) => s.sessionId === id);
          if (!current) throw new Error(`ReportSession ${id} not found`);
          const next = { ...current, ...patch };
          const own = draft.sessions.findIndex((s) => s.sessionId === id);
          if (own >= 0) draft.sessions[own] = next;
          else updated.set(id, next);
          return next;
        },
      },
    };

    try {
      const result = await fn(uow);
      this.tables = {
        readings: [...this.tables.readings, ...draft.readings],
        positions: [...this.tables.positions, ...draft.positions],
        sessions: [...this.tables.sessions.map((s) => updated.get(s.sessionId) ?? s), ...draft.sessions],
      };
      return result;
    } finally {
      for (const release of releases) release();
    }
  }

  /** Waits for earlier holders of `user` and returns the release callback. */
  private async lockUser(user: string): Promise<() => void> {
    const previous = this.userLocks.get(user) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.userLocks.set(user, tail);
    await previous;
    return () => {
      release();
      if (this.userLocks.get(user) === tail) this.userLocks.delete(user);
    };
  }

  private throwIfFailing(): void {
    const err = this.failNextCommit;
    if (err) {
      this.failNextCommit = null;
      throw err;
    }
  }
}

export class RecordingForwarder implements ReadingForwarderPort {
  readonly batches: StoredReading[][] = [];
  result = true;

  async forward(readings: readonly StoredReading[]): Promise<boolean> {
    this.batches.push([...readings]);
    return this.result;
  }
}

export class RecordingPublisher implements PositionPublisherPort {
  readonly published: ProcessedRecord[][] = [];

  async publishPositions(records: readonly ProcessedRecord[]): Promise<void> {
    this.published.push([...records]);
  }
}
