/** Inline command codes carried by the `cmd` field of a telemetry line. */
export const ReportCommand = {
  DISCARD: 0,
  OPEN: 1,
  CLOSE: 3,
} as const;

/** A user-scoped report interval opened and closed by inline commands. */
export interface ReportSession {
  readonly sessionId: number;
  readonly user: string;
  readonly name?: string;
  /** null only for rows created outside the service */
  readonly startedAt: Date | null;
  /** null while the session is open */
  readonly endedAt: Date | null;
  readonly spanX: number | null;
  readonly spanY: number | null;
}

export type SessionOutcome = 'opened' | 'updated' | 'closed' | 'none';
