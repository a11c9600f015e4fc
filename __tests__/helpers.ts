import type { Candle, MarketSnapshot, Signal, SignalSource } from '../src/signals/types';
import { createSignal } from '../src/signals/types';

export const SYMBOL = 'BTC/USDT';

export function candlesFrom(closes: number[]): Candle[] {
  return closes.map((close, i) => ({
    openTime: i * 3_600_000,
    open: close,
    high: close,
    low: close,
    close,
    volume: 1,
  }));
}

export function snapshotAt(price: number, closes: number[] = []): MarketSnapshot {
  return { symbol: SYMBOL, price, recentSeries: candlesFrom(closes), fetchedAt: 0 };
}

/** A source whose next opinion the test controls. */
export class ScriptedSource implements SignalSource {
  readonly name: string;
  next: Signal;
  readonly evaluate = jest.fn(async (_snapshot: MarketSnapshot): Promise<Signal> => this.next);

  constructor(name: string, next: Signal = createSignal('HOLD', 0, 'idle')) {
    this.name = name;
    this.next = next;
  }

  say(direction: Signal['direction'], confidence: number, rationale = `${direction.toLowerCase()} call`): void {
    this.next = createSignal(direction, confidence, rationale);
  }
}
