import type { StoredReading } from '../../entities/calibrated-reading.js';

export interface ReadingForwarderPort {
  /** Resolves false on any downstream failure; never rejects. */
  forward(readings: readonly StoredReading[]): Promise<boolean>;
}
