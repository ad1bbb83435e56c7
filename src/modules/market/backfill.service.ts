import { BarPersister } from './barPersister.service';
import { cleanBars } from './barQuality.service';
import {
  BackfillSummary,
  FetchOutcome,
  MarketDataSource,
  SymbolReport,
  SyncWindow,
} from './market.types';
import { SyncPlanner, utcToday } from './syncPlanner.service';
import logger from '../../common/utils/logger';
import { describeError } from '../../common/errors/backfillErrors';

export interface BackfillServiceOptions {
  interSymbolDelayMs: number;
  today?: () => string;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const summarize = (reports: SymbolReport[]): BackfillSummary => {
  const summary: BackfillSummary = {
    symbols: reports.length,
    fetchedCount: 0,
    validatedCount: 0,
    removedCount: 0,
    rejectedCount: 0,
    insertedCount: 0,
    skippedCount: 0,
    failedCount: 0,
    reports,
  };
  for (const r of reports) {
    summary.fetchedCount += r.fetched;
    summary.validatedCount += r.validated;
    summary.removedCount += r.removed;
    summary.rejectedCount += r.rejected;
    summary.insertedCount += r.inserted;
    if (r.status === 'already-current') summary.skippedCount++;
    if (r.status === 'fetch-failed' || r.status === 'persist-failed') summary.failedCount++;
  }
  return summary;
};

/**
 * Walks the symbol list one symbol at a time:
 * plan -> fetch -> clean -> persist, pausing between provider calls.
 */
export class BackfillService {
  private readonly today: () => string;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly source: MarketDataSource,
    private readonly planner: SyncPlanner,
    private readonly persister: BarPersister,
    private readonly options: BackfillServiceOptions
  ) {
    this.today = options.today ?? (() => utcToday());
    this.sleep = options.sleep ?? defaultSleep;
  }

  async run(symbols: readonly string[]): Promise<BackfillSummary> {
    const today = this.today();
    logger.info({ symbols: symbols.length, today }, 'Starting market data backfill');

    const reports: SymbolReport[] = [];
    for (let i = 0; i < symbols.length; i++) {
      const symbol = symbols[i];
      logger.info({ symbol, position: `${i + 1}/${symbols.length}` }, 'Processing symbol');

      const report = await this.syncSymbol(symbol, today);
      reports.push(report);
      logger.info({ ...report }, 'Symbol processed');

      const isLast = i === symbols.length - 1;
      if (report.status !== 'already-current' && !isLast && this.options.interSymbolDelayMs > 0) {
        await this.sleep(this.options.interSymbolDelayMs);
      }
    }

    const summary = summarize(reports);
    logger.info(
      {
        symbols: summary.symbols,
        fetched: summary.fetchedCount,
        validated: summary.validatedCount,
        removed: summary.removedCount,
        rejected: summary.rejectedCount,
        inserted: summary.insertedCount,
        skipped: summary.skippedCount,
        failed: summary.failedCount,
      },
      'Backfill complete'
    );
    return summary;
  }

  private async fetch(symbol: string, window: SyncWindow): Promise<FetchOutcome> {
    try {
      const bars = await this.source.fetchBars(symbol, window.from, window.to);
      return { status: 'ok', bars };
    } catch (error) {
      return { status: 'error', error };
    }
  }

  private async syncSymbol(symbol: string, today: string): Promise<SymbolReport> {
    const report: SymbolReport = {
      symbol,
      status: 'empty',
      window: null,
      fetched: 0,
      validated: 0,
      removed: 0,
      rejected: 0,
      inserted: 0,
    };

    const plan = await this.planner.plan(symbol, today);
    if (plan.kind === 'already-current') {
      logger.info({ symbol, watermark: plan.watermark }, 'Already current, skipping');
      return { ...report, status: 'already-current' };
    }
    report.window = plan.window;
    logger.debug({ symbol, mode: plan.mode, ...plan.window }, 'Planned sync window');

    const outcome = await this.fetch(symbol, plan.window);
    if (outcome.status === 'error') {
      logger.error({ symbol, error: describeError(outcome.error) }, 'Fetch failed, continuing with next symbol');
      return { ...report, status: 'fetch-failed' };
    }
    report.fetched = outcome.bars.length;

    const cleaned = cleanBars(outcome.bars, symbol);
    report.validated = cleaned.bars.length;
    report.removed = cleaned.removed;
    if (cleaned.removed > 0) {
      logger.debug({ symbol, ...cleaned.rejections }, 'Removed invalid bars');
    }
    if (cleaned.bars.length === 0) return report;

    const persisted = await this.persister.persist(cleaned.bars);
    report.rejected = persisted.rejected;
    report.inserted = persisted.inserted;
    report.status = persisted.committed ? 'synced' : 'persist-failed';
    return report;
  }
}
