import moment from 'moment';
import { SyncPlan } from './market.types';
import { WatermarkStore } from './watermark.service';

const DATE_FORMAT = 'YYYY-MM-DD';

export class SyncPlanner {
  constructor(
    private readonly watermarks: WatermarkStore,
    private readonly initialBackfillDays = 30
  ) {}

  // `today` is a YYYY-MM-DD string
  async plan(symbol: string, today: string): Promise<SyncPlan> {
    const end = moment.utc(today, DATE_FORMAT, true);
    const watermark = await this.watermarks.getWatermark(symbol);

    if (watermark === null) {
      return {
        kind: 'window',
        symbol,
        mode: 'initial',
        window: {
          from: end.clone().subtract(this.initialBackfillDays, 'days').format(DATE_FORMAT),
          to: today,
        },
      };
    }

    const from = moment.utc(watermark, DATE_FORMAT, true).add(1, 'day');
    if (from.isAfter(end)) {
      return { kind: 'already-current', symbol, watermark };
    }

    return {
      kind: 'window',
      symbol,
      mode: 'incremental',
      window: { from: from.format(DATE_FORMAT), to: today },
    };
  }
}

export const utcToday = (now: Date = new Date()) => moment.utc(now).format(DATE_FORMAT);
