export class BackfillError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

// Invalid or missing environment variables
export class ConfigError extends BackfillError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export class DatabaseConnectionError extends BackfillError {}

export class SchemaSetupError extends BackfillError {}

/**
 * Raised by a market data source when a request fails or the provider
 * answers with something that is not a list of bars.
 */
export class MarketDataError extends BackfillError {
  constructor(
    message: string,
    public readonly symbol: string,
    cause?: unknown
  ) {
    super(message, cause);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * A batch write that failed after some rows were already stored, which only
 * happens when the write ran without a transaction.
 */
export class PartialBatchError extends BackfillError {
  constructor(
    message: string,
    public readonly written: number,
    cause?: unknown
  ) {
    super(message, cause);
  }
}
