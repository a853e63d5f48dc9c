/**
 * Error taxonomy for the scanner.
 *
 * Only ConfigurationError is fatal; everything else is caught per symbol and
 * turned into a skip-and-continue outcome by the scanner.
 */

export class ScannerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Structural misconfiguration, e.g. a non-positive RSI period. */
export class ConfigurationError extends ScannerError {}

/** No usable bars for a symbol: empty response, provider error or timeout. */
export class DataUnavailableError extends ScannerError {
  readonly symbol: string;

  constructor(symbol: string, reason: string, options?: { cause?: unknown }) {
    super(`No data for ${symbol}: ${reason}`, options);
    this.symbol = symbol;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
