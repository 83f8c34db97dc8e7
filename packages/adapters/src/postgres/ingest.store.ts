import type { IngestStorePort, IngestUnitOfWork } from '@uwb-locator/domain';
import { getPool, withTransaction } from './pool.js';
import type { DbPool } from './pool.js';
import { PgReadingRepository } from './reading.repository.js';
import { PgPositionRepository } from './position.repository.js';
import { PgReportSessionRepository } from './report-session.repository.js';

/** One pg transaction per ingested batch; every repository shares its client. */
export class PgIngestStore implements IngestStorePort {
  constructor(private readonly pool: DbPool = getPool()) {}

  transaction<T>(fn: (uow: IngestUnitOfWork) => Promise<T>): Promise<T> {
    return withTransaction(
      (client) =>
        fn({
          readings: new PgReadingRepository(client),
          positions: new PgPositionRepository(client),
          sessions: new PgReportSessionRepository(client),
        }),
      this.pool,
    );
  }
}
