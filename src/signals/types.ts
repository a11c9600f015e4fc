import { InvalidSignalError } from '../errors';

export type SignalDirection = 'BUY' | 'SELL' | 'HOLD';

const DIRECTIONS: readonly string[] = ['BUY', 'SELL', 'HOLD'];

export interface Signal {
  readonly direction: SignalDirection;
  /** 0..100 */
  readonly confidence: number;
  readonly rationale: string;
}

export interface Candle {
  openTime: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface MarketSnapshot {
  symbol: string;
  price: number;
  recentSeries: Candle[];
  fetchedAt: number;
}

/** A pluggable analysis module. Internals are opaque to the engine. */
export interface SignalSource {
  readonly name: string;
  evaluate(snapshot: MarketSnapshot): Promise<Signal>;
}

export interface WeightedOpinion {
  sourceName: string;
  /** 0..1 */
  weight: number;
  signal: Signal;
  enabled: boolean;
}

export function createSignal(direction: SignalDirection, confidence: number, rationale: string): Signal {
  if (!DIRECTIONS.includes(direction)) {
    throw new InvalidSignalError(`Unknown signal direction ${String(direction)}`);
  }
  if (!Number.isFinite(confidence) || confidence < 0 || confidence > 100) {
    throw new InvalidSignalError(`Confidence must be between 0 and 100, got ${confidence}`);
  }
  return Object.freeze({ direction, confidence, rationale });
}

export function hold(rationale: string, confidence = 0): Signal {
  return createSignal('HOLD', confidence, rationale);
}

export function closes(snapshot: MarketSnapshot): number[] {
  return snapshot.recentSeries.map((c) => c.close);
}
