import type {
  NewReportSession,
  ReportSession,
  ReportSessionPatch,
  ReportSessionRepositoryPort,
} from '@uwb-locator/domain';
import type { DbClient } from './pool.js';

/**
 * The report table keeps span_x / span_y as varchar. Values are numbers
 * everywhere else and are converted here, at the storage boundary only.
 */
type ReportSessionRow = {
  id: number;
  user: string;
  name: string | null;
  started_at: Date | null;
  ended_at: Date | null;
  span_x: string | null;
  span_y: string | null;
};

export class PgReportSessionRepository implements ReportSessionRepositoryPort {
  constructor(private readonly client: DbClient) {}

  /**
   * Takes a transaction-scoped advisory lock on the user first, so concurrent
   * batches for the same user read and change its sessions one at a time.
   */
  async findOpenByUser(user: string): Promise<ReportSession | null> {
    await this.client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [user]);
    const { rows } = await this.client.query<ReportSessionRow>(
      `SELECT * FROM uwb.report_sessions
       WHERE "user" = $1 AND ended_at IS NULL
       ORDER BY id DESC
       LIMIT 1`,
      [user],
    );
    const row = rows[0];
    return row ? mapSessionRow(row) : null;
  }

  async insert(session: NewReportSession): Promise<ReportSession> {
    const { rows } = await this.client.query<ReportSessionRow>(
      `INSERT INTO uwb.report_sessions ("user", started_at, span_x, span_y)
       VALUES ($1, $2, $3, $4)
       RETURNING *`,
      [session.user, session.startedAt, spanToText(session.spanX), spanToText(session.spanY)],
    );
    const row = rows[0];
    if (!row) throw new Error(`report session insert for ${session.user} returned no row`);
    return mapSessionRow(row);
  }

  async update(sessionId: number, patch: ReportSessionPatch): Promise<ReportSession> {
    const sets: string[] = [];
    const params: unknown[] = [sessionId];
    const push = (column: string, value: unknown) => {
      params.push(value);
      sets.push(`${column} = $${params.length}`);
    };
    if (patch.startedAt !== undefined) push('started_at', patch.startedAt);
    if (patch.endedAt !== undefined) push('ended_at', patch.endedAt);
    if (patch.spanX !== undefined) push('span_x', spanToText(patch.spanX));
    if (patch.spanY !== undefined) push('span_y', spanToText(patch.spanY));

    const sql =
      sets.length > 0
        ? `UPDATE uwb.report_sessions SET ${sets.join(', ')} WHERE id = $1 RETURNING *`
        : `SELECT * FROM uwb.report_sessions WHERE id = $1`;
    const { rows } = await this.client.query<ReportSessionRow>(sql, params);
    const row = rows[0];
    if (!row) throw new Error(`ReportSession ${sessionId} not found`);
    return mapSessionRow(row);
  }
}

function spanToText(value: number | null): string | null {
  return value === null ? null : String(value);
}

function spanFromText(value: string | null): number | null {
  if (value === null || value.trim() === '') return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

function mapSessionRow(row: ReportSessionRow): ReportSession {
  return {
    sessionId: row.id,
    user: row.user,
    name: row.name ?? undefined,
    startedAt: row.started_at,
    endedAt: row.ended_at,
    spanX: spanFromText(row.span_x),
    spanY: spanFromText(row.span_y),
  };
}
