import { ClientSession } from 'mongoose';
import MarketBar from './marketBar.model';
import { ValidatedBar } from './market.types';
import { runInTransaction } from '../../common/utils/transaction';
import { PartialBatchError, describeError } from '../../common/errors/backfillErrors';
import logger from '../../common/utils/logger';

// MongoBulkWriteError exposes how many upserts landed before the failure
const upsertedBeforeFailure = (error: unknown): number =>
  typeof error === 'object' && error !== null && 'upsertedCount' in error && typeof error.upsertedCount === 'number'
    ? error.upsertedCount
    : 0;

/** Storage port for persisted bars. */
export interface BarRepository {
  /** Latest stored calendar date for `symbol`, `null` when it has no bars. */
  findLatestDate(symbol: string): Promise<string | null>;
  /**
   * Inserts bars whose (symbol, timestamp) is not stored yet, as one atomic
   * batch. Resolves with the number of bars created; rejects when the batch
   * was rolled back, or with `PartialBatchError` when rows written without a
   * transaction stayed stored.
   */
  insertIfAbsent(bars: readonly ValidatedBar[]): Promise<number>;
}

export class MongoBarRepository implements BarRepository {
  async findLatestDate(symbol: string): Promise<string | null> {
    const latest = await MarketBar.findOne({ symbol: symbol.toUpperCase() })
      .sort({ timestamp: -1 })
      .select('date')
      .lean();
    return latest ? latest.date : null;
  }

  async insertIfAbsent(bars: readonly ValidatedBar[]): Promise<number> {
    if (bars.length === 0) return 0;

    const ops = bars.map((bar) => ({
      updateOne: {
        filter: { symbol: bar.symbol, timestamp: bar.timestamp },
        update: {
          $setOnInsert: {
            symbol: bar.symbol,
            timestamp: bar.timestamp,
            date: bar.date,
            open: bar.open,
            high: bar.high,
            low: bar.low,
            close: bar.close,
            volume: bar.volume,
          },
        },
        upsert: true,
      },
    }));

    return runInTransaction(async (session: ClientSession | null) => {
      // Schema timestamps add createdAt to $setOnInsert
      if (session) {
        const result = await MarketBar.bulkWrite(ops, { ordered: true, session });
        return result.upsertedCount;
      }

      try {
        const result = await MarketBar.bulkWrite(ops, { ordered: true });
        return result.upsertedCount;
      } catch (error) {
        const written = upsertedBeforeFailure(error);
        if (written === 0) throw error;
        logger.warn({ symbol: bars[0].symbol, written, error: describeError(error) }, 'Batch failed without transaction, rows kept');
        throw new PartialBatchError(`Batch for ${bars[0].symbol} failed after ${written} rows`, written, error);
      }
    });
  }
}
