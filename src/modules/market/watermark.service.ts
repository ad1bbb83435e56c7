import moment from 'moment';
import { BarRepository } from './marketBar.repository';
import logger from '../../common/utils/logger';
import { describeError } from '../../common/errors/backfillErrors';

/**
 * Per-symbol watermark: the latest calendar date with at least one stored
 * bar. Always read from the bars themselves, so writes advance it.
 */
export class WatermarkStore {
  constructor(private readonly repository: BarRepository) {}

  async getWatermark(symbol: string): Promise<string | null> {
    try {
      const date = await this.repository.findLatestDate(symbol);
      if (date === null) return null;
      if (!moment.utc(date, 'YYYY-MM-DD', true).isValid()) {
        logger.warn({ symbol, date }, 'Ignoring unreadable watermark');
        return null;
      }
      return date;
    } catch (error) {
      logger.warn({ symbol, error: describeError(error) }, 'Watermark lookup failed, treating symbol as new');
      return null;
    }
  }
}
