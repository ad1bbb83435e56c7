#!/usr/bin/env node
import { loadConfig, loadEnvFile } from '../config/config';
import { runBackfill } from '../modules/market/backfill.runner';
import logger from '../common/utils/logger';

const main = async () => {
  try {
    loadEnvFile();
    const config = loadConfig();
    logger.level = config.logLevel;

    // Symbols on the command line replace the configured list
    const cliSymbols = process.argv.slice(2).map((s) => s.trim().toUpperCase()).filter(Boolean);
    const symbols = cliSymbols.length > 0 ? [...new Set(cliSymbols)] : config.symbols;

    const summary = await runBackfill(config, undefined, symbols);
    logger.info({ inserted: summary.insertedCount, failed: summary.failedCount }, 'Backfill worker finished');
    process.exit(0);
  } catch (error) {
    logger.error({ err: error }, 'Backfill worker failed');
    process.exit(1);
  }
};

void main();
