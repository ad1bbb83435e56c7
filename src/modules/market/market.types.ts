/** One 1-minute bar as the provider returns it; nothing is guaranteed. */
export interface RawBar {
  date?: unknown;
  open?: unknown;
  high?: unknown;
  low?: unknown;
  close?: unknown;
  volume?: unknown;
}

export interface ValidatedBar {
  symbol: string;
  timestamp: Date;
  date: string; // YYYY-MM-DD, UTC calendar date of `timestamp`
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface MarketDataSource {
  /** Bars for `symbol` between two inclusive `YYYY-MM-DD` dates; `[]` when the provider has none. */
  fetchBars(symbol: string, from: string, to: string): Promise<RawBar[]>;
}

export interface SyncWindow {
  from: string;
  to: string;
}

export type SyncPlan =
  | { kind: 'window'; symbol: string; mode: 'initial' | 'incremental'; window: SyncWindow }
  | { kind: 'already-current'; symbol: string; watermark: string };

export type FetchOutcome =
  | { status: 'ok'; bars: RawBar[] }
  | { status: 'error'; error: unknown };

export type RejectionReason = 'timestamp' | 'malformed' | 'missing' | 'invariant' | 'duplicate';

export type RejectionCounts = Record<RejectionReason, number>;

export interface CleanResult {
  bars: ValidatedBar[];
  removed: number;
  rejections: RejectionCounts;
}

export interface PersistResult {
  inserted: number;
  rejected: number; // rows refused by the schema at the storage boundary
  committed: boolean;
}

export type SymbolStatus = 'synced' | 'empty' | 'already-current' | 'fetch-failed' | 'persist-failed';

export interface SymbolReport {
  symbol: string;
  status: SymbolStatus;
  window: SyncWindow | null;
  fetched: number;
  validated: number;
  removed: number;
  rejected: number;
  inserted: number;
}

export interface BackfillSummary {
  symbols: number;
  fetchedCount: number;
  validatedCount: number;
  removedCount: number;
  rejectedCount: number;
  insertedCount: number;
  skippedCount: number;
  failedCount: number;
  reports: SymbolReport[];
}
