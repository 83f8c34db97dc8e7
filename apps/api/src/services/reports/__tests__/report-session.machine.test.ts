import { describe, it, expect, beforeEach } from '@jest/globals';
import type { IngestUnitOfWork } from '@uwb-locator/domain';
import { applySessionCommand } from '../report-session.machine.js';
import type { SessionSignal } from '../report-session.machine.js';
import { InMemoryIngestStore } from '../../../__tests__/support/in-memory-ingest-store.js';

const T0 = new Date('2026-01-05T10:00:00.000Z');
const T1 = new Date('2026-01-05T10:05:00.000Z');

function signal(command: number, sessionUser?: string, spanX: number | null = null, spanY: number | null = null): SessionSignal {
  return { command, sessionUser, spanX, spanY };
}

describe('applySessionCommand', () => {
  let store: InMemoryIngestStore;

  const run = <T>(fn: (uow: IngestUnitOfWork) => Promise<T>) => store.transaction(fn);
  const isOpen = (user: string) => run(async (uow) => (await uow.sessions.findOpenByUser(user)) !== null);

  beforeEach(() => {
    store = new InMemoryIngestStore();
  });

  it('opens, closes, then ignores a second close', async () => {
    expect(await run((uow) => applySessionCommand(signal(1, 'alice', 100, 60), uow.sessions, T0))).toBe('opened');
    expect(await isOpen('alice')).toBe(true);

    expect(await run((uow) => applySessionCommand(signal(3, 'alice'), uow.sessions, T1))).toBe('closed');
    expect(await isOpen('alice')).toBe(false);

    expect(await run((uow) => applySessionCommand(signal(3, 'alice'), uow.sessions, T1))).toBe('none');

    expect(store.tables.sessions).toEqual([
      { sessionId: 1, user: 'alice', startedAt: T0, endedAt: T1, spanX: 100, spanY: 60 },
    ]);
  });

  it('updates the open session in place instead of opening another', async () => {
    await run((uow) => applySessionCommand(signal(1, 'alice', 100, 60), uow.sessions, T0));
    const outcome = await run((uow) => applySessionCommand(signal(1, 'alice', 120, null), uow.sessions, T1));

    expect(outcome).toBe('updated');
    expect(store.tables.sessions).toEqual([
      { sessionId: 1, user: 'alice', startedAt: T0, endedAt: null, spanX: 120, spanY: 60 },
    ]);
  });

  it('backfills a missing start time', async () => {
    store.tables.sessions.push({
      sessionId: 7,
      user: 'bob',
      startedAt: null,
      endedAt: null,
      spanX: null,
      spanY: null,
    });
    await run((uow) => applySessionCommand(signal(1, 'bob'), uow.sessions, T1));
    expect(store.tables.sessions[0]?.startedAt).toEqual(T1);
  });

  it('keeps sessions per user', async () => {
    await run((uow) => applySessionCommand(signal(1, 'alice'), uow.sessions, T0));
    await run((uow) => applySessionCommand(signal(1, 'bob'), uow.sessions, T0));
    await run((uow) => applySessionCommand(signal(3, 'alice'), uow.sessions, T1));

    expect(await isOpen('alice')).toBe(false);
    expect(await isOpen('bob')).toBe(true);
  });

  it('does nothing without a user', async () => {
    expect(await run((uow) => applySessionCommand(signal(1), uow.sessions, T0))).toBe('none');
    expect(await run((uow) => applySessionCommand(signal(1, '  '), uow.sessions, T0))).toBe('none');
    expect(store.tables.sessions).toHaveLength(0);
  });

  it('ignores other commands', async () => {
    for (const cmd of [0, 2, 4, -1]) {
      expect(await run((uow) => applySessionCommand(signal(cmd, 'alice'), uow.sessions, T0))).toBe('none');
    }
    expect(store.tables.sessions).toHaveLength(0);
  });
});
