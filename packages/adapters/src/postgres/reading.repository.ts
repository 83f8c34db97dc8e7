import type { CalibratedReading, ReadingRepositoryPort, StoredReading } from '@uwb-locator/domain';
import { DISTANCE_SLOT_COUNT } from '@uwb-locator/domain';
import type { DbClient } from './pool.js';

type RawReadingRow = {
  id: number;
  tag_id: string;
  d0: number | null;
  d1: number | null;
  d2: number | null;
  d3: number | null;
  d4: number | null;
  d5: number | null;
  d6: number | null;
  d7: number | null;
  span_x: number | null;
  span_y: number | null;
  created_at: Date;
};

// tag_id + 8 slots + span_x + span_y + created_at
const COLS_PER_ROW = 12;

export class PgReadingRepository implements ReadingRepositoryPort {
  constructor(private readonly client: DbClient) {}

  async appendMany(readings: readonly CalibratedReading[]): Promise<StoredReading[]> {
    if (readings.length === 0) return [];
    const values: unknown[] = [];
    const placeholders = readings.map((r, i) => {
      const base = i * COLS_PER_ROW;
      values.push(r.tagId);
      for (let slot = 0; slot < DISTANCE_SLOT_COUNT; slot++) {
        values.push(r.distances[slot] ?? null);
      }
      values.push(r.spanX, r.spanY, r.capturedAt);
      const cols = Array.from({ length: COLS_PER_ROW }, (_, k) => `$${base + k + 1}`);
      return `(${cols.join(',')})`;
    });
    const { rows } = await this.client.query<RawReadingRow>(
      `INSERT INTO uwb.raw_readings
         (tag_id, d0, d1, d2, d3, d4, d5, d6, d7, span_x, span_y, created_at)
       VALUES ${placeholders.join(',')}
       RETURNING *`,
      values,
    );
    return rows.map(mapReadingRow);
  }
}

function mapReadingRow(row: RawReadingRow): StoredReading {
  return {
    id: row.id,
    tagId: row.tag_id,
    distances: [row.d0, row.d1, row.d2, row.d3, row.d4, row.d5, row.d6, row.d7],
    spanX: row.span_x,
    spanY: row.span_y,
    createdAt: row.created_at,
  };
}
