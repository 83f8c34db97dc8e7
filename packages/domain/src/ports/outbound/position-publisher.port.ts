import type { ProcessedRecord } from '../../entities/processed-record.js';

export interface PositionPublisherPort {
  publishPositions(records: readonly ProcessedRecord[]): Promise<void>;
}
