import { ReportCommand } from '@uwb-locator/domain';
import type {
  ReportSessionPatch,
  ReportSessionRepositoryPort,
  SessionOutcome,
} from '@uwb-locator/domain';

/** The parts of a reading that drive the session machine. */
export interface SessionSignal {
  readonly command: number;
  readonly sessionUser?: string;
  readonly spanX: number | null;
  readonly spanY: number | null;
}

/**
 * Applies an inline command to the user's report session.
 *
 * - cmd 1 opens a session, or refreshes the open one's span snapshot
 *   (non-null values only) and backfills a missing start time.
 * - cmd 3 closes the open session; without one it does nothing.
 * - anything else, or a reading without a user, leaves sessions alone.
 */
export async function applySessionCommand(
  signal: SessionSignal,
  sessions: ReportSessionRepositoryPort,
  now: Date,
): Promise<SessionOutcome> {
  const user = signal.sessionUser?.trim();
  if (!user) return 'none';

  switch (signal.command) {
    case ReportCommand.OPEN: {
      const open = await sessions.findOpenByUser(user);
      if (!open) {
        await sessions.insert({ user, startedAt: now, spanX: signal.spanX, spanY: signal.spanY });
        return 'opened';
      }
      const patch: ReportSessionPatch = {};
      if (signal.spanX !== null) patch.spanX = signal.spanX;
      if (signal.spanY !== null) patch.spanY = signal.spanY;
      if (open.startedAt === null) patch.startedAt = now;
      if (Object.keys(patch).length > 0) {
        await sessions.update(open.sessionId, patch);
      }
      return 'updated';
    }
    case ReportCommand.CLOSE: {
      const open = await sessions.findOpenByUser(user);
      if (!open) return 'none';
      await sessions.update(open.sessionId, { endedAt: now });
      return 'closed';
    }
    default:
      return 'none';
  }
}
