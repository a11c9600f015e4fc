export type TradingErrorCode =
  | 'CONFIG'
  | 'EXCHANGE'
  | 'MARKET_DATA'
  | 'POSITION_STATE'
  | 'NOT_FOUND'
  | 'INVALID_SIGNAL'
  | 'ENGINE_STATE';

export class TradingError extends Error {
  readonly code: TradingErrorCode;

  constructor(code: TradingErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends TradingError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}

/** Transient venue failure: order placement or price fetch. Retried on the next cycle. */
export class ExchangeError extends TradingError {
  readonly venue: string;

  constructor(venue: string, message: string, cause?: unknown) {
    super('EXCHANGE', `${venue}: ${message}`, { cause });
    this.venue = venue;
  }
}

export class MarketDataError extends TradingError {
  constructor(message: string, cause?: unknown) {
    super('MARKET_DATA', message, { cause });
  }
}

export class PositionStateError extends TradingError {
  constructor(message: string) {
    super('POSITION_STATE', message);
  }
}

export class NotFoundError extends TradingError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class InvalidSignalError extends TradingError {
  constructor(message: string) {
    super('INVALID_SIGNAL', message);
  }
}

export class EngineStateError extends TradingError {
  constructor(message: string) {
    super('ENGINE_STATE', message);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
