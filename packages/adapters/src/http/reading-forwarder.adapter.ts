import { fetch } from 'undici';
import type { ReadingForwarderPort, StoredReading } from '@uwb-locator/domain';

export interface HttpReadingForwarderOptions {
  url: string;
  timeoutMs?: number;
}

/**
 * Pushes newly committed raw readings to a downstream endpoint.
 * Any failure is reported as `false`; committed storage is never affected.
 */
export class HttpReadingForwarder implements ReadingForwarderPort {
  private readonly timeoutMs: number;

  constructor(private readonly opts: HttpReadingForwarderOptions) {
    this.timeoutMs = opts.timeoutMs ?? 3_000;
  }

  async forward(readings: readonly StoredReading[]): Promise<boolean> {
    if (readings.length === 0) return true;
    try {
      const res = await fetch(this.opts.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ readings: readings.map(toWire) }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!res.ok) {
        console.warn(`[forwarder] downstream responded ${res.status} for ${readings.length} readings`);
        return false;
      }
      return true;
    } catch (err) {
      console.warn(
        '[forwarder] downstream push failed',
        err instanceof Error ? err.message : err,
      );
      return false;
    }
  }
}

/** Used when no downstream endpoint is configured. */
export class DisabledReadingForwarder implements ReadingForwarderPort {
  async forward(): Promise<boolean> {
    return false;
  }
}

function toWire(r: StoredReading) {
  return {
    id: r.id,
    tagId: r.tagId,
    distances: r.distances,
    spanX: r.spanX,
    spanY: r.spanY,
    createdAt: r.createdAt.toISOString(),
  };
}
