import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { MarketDataSource, RawBar } from './market.types';
import { MarketDataError, describeError } from '../../common/errors/backfillErrors';
import logger from '../../common/utils/logger';

export interface FmpProviderOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

const rawBarSchema = z
  .object({
    date: z.unknown(),
    open: z.unknown(),
    high: z.unknown(),
    low: z.unknown(),
    close: z.unknown(),
    volume: z.unknown(),
  })
  .passthrough();

const chartResponseSchema = z.array(rawBarSchema);

/**
 * Financial Modeling Prep historical 1-minute chart.
 * FMP answers an empty array for a symbol without data in the range, and an
 * object such as `{ "Error Message": "..." }` for a bad key or plan limit.
 */
export class FmpProvider implements MarketDataSource {
  private readonly http: Pick<AxiosInstance, 'get'>;

  constructor(
    private readonly options: FmpProviderOptions,
    http?: Pick<AxiosInstance, 'get'>
  ) {
    this.http = http ?? axios.create({ baseURL: options.baseUrl, timeout: options.timeoutMs });
  }

  async fetchBars(symbol: string, from: string, to: string): Promise<RawBar[]> {
    let data: unknown;
    try {
      const res = await this.http.get(`/historical-chart/1min/${encodeURIComponent(symbol)}`, {
        params: {
          from,
          to,
          apikey: this.options.apiKey,
        },
      });
      data = res.data;
    } catch (error) {
      throw new MarketDataError(`Request for ${symbol} failed: ${describeError(error)}`, symbol, error);
    }

    const parsed = chartResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new MarketDataError(`Unexpected chart payload for ${symbol}`, symbol, parsed.error);
    }

    logger.debug({ symbol, from, to, count: parsed.data.length }, 'Fetched bars from FMP');
    return parsed.data;
  }
}
