import { BackfillConfig } from '../../config/config';
import { connectDB, disconnectDB } from '../../config/db';
import { BackfillService } from './backfill.service';
import { BarPersister } from './barPersister.service';
import { FmpProvider } from './fmp.provider';
import { BackfillSummary, MarketDataSource } from './market.types';
import { ensureMarketBarSchema } from './marketBar.model';
import { BarRepository, MongoBarRepository } from './marketBar.repository';
import { SyncPlanner } from './syncPlanner.service';
import { WatermarkStore } from './watermark.service';

export interface BackfillDependencies {
  connect: () => Promise<void>;
  ensureSchema: () => Promise<void>;
  disconnect: () => Promise<void>;
  source: MarketDataSource;
  repository: BarRepository;
  today?: () => string;
  sleep?: (ms: number) => Promise<void>;
}

export const createDefaultDependencies = (config: BackfillConfig): BackfillDependencies => ({
  connect: () => connectDB(config.database),
  ensureSchema: ensureMarketBarSchema,
  disconnect: disconnectDB,
  source: new FmpProvider(config.fmp),
  repository: new MongoBarRepository(),
});

export const buildBackfillService = (config: BackfillConfig, deps: BackfillDependencies) =>
  new BackfillService(
    deps.source,
    new SyncPlanner(new WatermarkStore(deps.repository), config.initialBackfillDays),
    new BarPersister(deps.repository),
    { interSymbolDelayMs: config.interSymbolDelayMs, today: deps.today, sleep: deps.sleep }
  );

/**
 * One complete backfill pass. Connection and schema failures are fatal and
 * propagate; the connection is closed once it has been opened.
 */
export const runBackfill = async (
  config: BackfillConfig,
  deps: BackfillDependencies = createDefaultDependencies(config),
  symbols: readonly string[] = config.symbols
): Promise<BackfillSummary> => {
  await deps.connect();
  try {
    await deps.ensureSchema();
    return await buildBackfillService(config, deps).run(symbols);
  } finally {
    await deps.disconnect();
  }
};
