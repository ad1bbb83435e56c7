import { Schema, model, Document } from 'mongoose';
import { SchemaSetupError } from '../../common/errors/backfillErrors';
import logger from '../../common/utils/logger';

export interface IMarketBar extends Document {
  symbol: string;
  timestamp: Date;    // Start of the 1-minute bar
  date: string;       // YYYY-MM-DD, drives the per-symbol watermark
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  createdAt: Date;
}

const positivePrice = {
  type: Number,
  required: true,
  validate: {
    validator: (value: number) => Number.isFinite(value) && value > 0,
    message: '{PATH} must be a positive number',
  },
};

const marketBarSchema = new Schema<IMarketBar>({
  symbol: { type: String, required: true, uppercase: true, trim: true, maxlength: 10 },
  timestamp: { type: Date, required: true },
  date: { type: String, required: true, match: /^\d{4}-\d{2}-\d{2}$/ },
  open: positivePrice,
  high: positivePrice,
  low: positivePrice,
  close: positivePrice,
  volume: {
    type: Number,
    required: true,
    min: 0,
    validate: {
      validator: Number.isSafeInteger,
      message: 'volume must be a whole number',
    },
  },
}, {
  collection: 'market_bars',
  timestamps: { createdAt: true, updatedAt: false },
});

// One bar per symbol and minute; insert-if-absent relies on this
marketBarSchema.index({ symbol: 1, timestamp: 1 }, { unique: true });
// Watermark lookup
marketBarSchema.index({ symbol: 1, date: -1 });

const MarketBar = model<IMarketBar>('MarketBar', marketBarSchema);

/**
 * Creates the collection and its indexes when missing. Safe to call on every
 * start: existing collections and identical indexes are left alone.
 */
export const ensureMarketBarSchema = async () => {
  try {
    await MarketBar.createCollection();
    await MarketBar.createIndexes();
    logger.info({ collection: MarketBar.collection.collectionName }, 'Market bar collection verified');
  } catch (error) {
    logger.error({ err: error }, 'Market bar schema setup failed');
    throw new SchemaSetupError('Could not create market_bars collection or indexes', error);
  }
};

export default MarketBar;
