import { describe, it, expect, jest } from '@jest/globals';
import { PgReportSessionRepository } from '../postgres/report-session.repository.js';
import type { DbClient } from '../postgres/pool.js';

type QueryFn = (sql: string, params?: unknown[]) => Promise<{ rows: Record<string, unknown>[] }>;

const STARTED = new Date('2026-01-05T10:00:00.000Z');

function fakeClient(rows: Record<string, unknown>[]) {
  const query = jest.fn<QueryFn>().mockResolvedValue({ rows });
  return { query, client: { query } as unknown as DbClient };
}

const ROW = {
  id: 3,
  user: 'alice',
  name: null,
  started_at: STARTED,
  ended_at: null,
  span_x: '112.75',
  span_y: '61.3',
};

describe('PgReportSessionRepository', () => {
  it('finds the newest open session and parses text spans', async () => {
    const { query, client } = fakeClient([ROW]);
    const session = await new PgReportSessionRepository(client).findOpenByUser('alice');

    expect(session).toEqual({
      sessionId: 3,
      user: 'alice',
      name: undefined,
      startedAt: STARTED,
      endedAt: null,
      spanX: 112.75,
      spanY: 61.3,
    });
    expect(query.mock.calls[1]?.[1]).toEqual(['alice']);
  });

  it('locks the user before looking up the open session', async () => {
    const { query, client } = fakeClient([]);
    await new PgReportSessionRepository(client).findOpenByUser('alice');

    expect(query).toHaveBeenCalledTimes(2);
    expect(query.mock.calls[0]?.[0]).toBe('SELECT pg_advisory_xact_lock(hashtext($1))');
    expect(query.mock.calls[0]?.[1]).toEqual(['alice']);
  });

  it('returns null when the user has no open session', async () => {
    const { client } = fakeClient([]);
    expect(await new PgReportSessionRepository(client).findOpenByUser('bob')).toBeNull();
  });

  it('stringifies spans on insert', async () => {
    const { query, client } = fakeClient([ROW]);
    await new PgReportSessionRepository(client).insert({
      user: 'alice',
      startedAt: STARTED,
      spanX: 112.75,
      spanY: null,
    });
    expect(query.mock.calls[0]?.[1]).toEqual(['alice', STARTED, '112.75', null]);
  });

  it('updates only the patched columns', async () => {
    const { query, client } = fakeClient([{ ...ROW, span_x: '120' }]);
    const session = await new PgReportSessionRepository(client).update(3, { spanX: 120 });

    expect(query.mock.calls[0]?.[0]).toBe(
      'UPDATE uwb.report_sessions SET span_x = $2 WHERE id = $1 RETURNING *',
    );
    expect(query.mock.calls[0]?.[1]).toEqual([3, '120']);
    expect(session.spanX).toBe(120);
  });

  it('treats blank span text as absent', async () => {
    const { client } = fakeClient([{ ...ROW, span_x: '  ', span_y: null }]);
    const session = await new PgReportSessionRepository(client).findOpenByUser('alice');
    expect(session?.spanX).toBeNull();
    expect(session?.spanY).toBeNull();
  });

  it('throws when the session to update does not exist', async () => {
    const { client } = fakeClient([]);
    await expect(new PgReportSessionRepository(client).update(99, { endedAt: STARTED })).rejects.toThrow(
      'ReportSession 99 not found',
    );
  });
});
