import type { PositionRepositoryPort, ProcessedRecord } from '@uwb-locator/domain';
import type { DbClient } from './pool.js';

export class PgPositionRepository implements PositionRepositoryPort {
  constructor(private readonly client: DbClient) {}

  async appendMany(records: readonly ProcessedRecord[]): Promise<void> {
    if (records.length === 0) return;
    const values: unknown[] = [];
    const placeholders = records.map((r, i) => {
      const base = i * 6;
      values.push(r.tagId, r.x, r.y, r.distanceTravelled, r.elapsedSeconds, r.recordedAt);
      const cols = Array.from({ length: 6 }, (_, k) => `$${base + k + 1}`);
      return `(${cols.join(',')})`;
    });
    await this.client.query(
      `INSERT INTO uwb.processed_positions
         (tag_id, x, y, distance_travelled, elapsed_seconds, created_at)
       VALUES ${placeholders.join(',')}`,
      values,
    );
  }
}
