import MarketBar from './marketBar.model';
import { BarRepository } from './marketBar.repository';
import { PersistResult, ValidatedBar } from './market.types';
import logger from '../../common/utils/logger';
import { PartialBatchError, describeError } from '../../common/errors/backfillErrors';

/** Schema check at the storage boundary; returns the failure message or null. */
export const checkAgainstSchema = (bar: ValidatedBar): string | null => {
  const error = new MarketBar(bar).validateSync();
  return error ? error.message : null;
};

export class BarPersister {
  constructor(private readonly repository: BarRepository) {}

  /**
   * Writes one symbol's batch. Rows the schema refuses are skipped, the rest
   * go in as a single insert-if-absent; a failed batch reports only the rows
   * that stayed stored, which is zero under a transaction.
   */
  async persist(bars: readonly ValidatedBar[]): Promise<PersistResult> {
    const accepted: ValidatedBar[] = [];
    let rejected = 0;

    for (const bar of bars) {
      const problem = checkAgainstSchema(bar);
      if (problem) {
        rejected++;
        logger.warn({ symbol: bar.symbol, timestamp: bar.timestamp.toISOString(), problem }, 'Skipped bar');
        continue;
      }
      accepted.push(bar);
    }

    if (accepted.length === 0) {
      return { inserted: 0, rejected, committed: true };
    }

    try {
      const inserted = await this.repository.insertIfAbsent(accepted);
      return { inserted, rejected, committed: true };
    } catch (error) {
      // Without a transaction the rows written before the failure stay stored
      const inserted = error instanceof PartialBatchError ? error.written : 0;
      logger.error(
        { symbol: accepted[0].symbol, count: accepted.length, inserted, error: describeError(error) },
        inserted > 0 ? 'Batch insert failed part way' : 'Batch insert rolled back'
      );
      return { inserted, rejected, committed: false };
    }
  }
}
