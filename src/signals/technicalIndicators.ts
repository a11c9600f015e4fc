import { closes, createSignal, hold } from './types';
import type { MarketSnapshot, Signal, SignalSource } from './types';
import { macd, rsi, sma } from './indicators';

export interface TechnicalIndicatorsOptions {
  rsiPeriod?: number;
  rsiOversold?: number;
  rsiOverbought?: number;
  maShort?: number;
  maLong?: number;
}

type Vote = { direction: 'BUY' | 'SELL'; points: number };

/** RSI extremes (30 pts), SMA crossover (25 pts) and MACD vs. its signal line (20 pts). */
export function createTechnicalIndicatorsSource(
  name = 'technical-indicators',
  opts: TechnicalIndicatorsOptions = {},
): SignalSource {
  const rsiPeriod = opts.rsiPeriod ?? 14;
  const oversold = opts.rsiOversold ?? 30;
  const overbought = opts.rsiOverbought ?? 70;
  const maShort = opts.maShort ?? 20;
  const maLong = opts.maLong ?? 50;

  return {
    name,
    async evaluate(snapshot: MarketSnapshot): Promise<Signal> {
      const series = closes(snapshot);
      if (series.length < maLong) return hold('Insufficient data for technical analysis');

      const votes: Vote[] = [];
      const reasons: string[] = [];

      const latestRsi = rsi(series, rsiPeriod);
      if (latestRsi !== null && latestRsi < oversold) {
        votes.push({ direction: 'BUY', points: 30 });
        reasons.push(`RSI oversold at ${latestRsi.toFixed(1)}`);
      } else if (latestRsi !== null && latestRsi > overbought) {
        votes.push({ direction: 'SELL', points: 30 });
        reasons.push(`RSI overbought at ${latestRsi.toFixed(1)}`);
      }

      const short = sma(series, maShort);
      const long = sma(series, maLong);
      if (short !== null && long !== null && short > long) {
        votes.push({ direction: 'BUY', points: 25 });
        reasons.push('MA bullish crossover');
      } else if (short !== null && long !== null && short < long) {
        votes.push({ direction: 'SELL', points: 25 });
        reasons.push('MA bearish crossover');
      }

      const m = macd(series);
      if (m && m.macd > m.signal) {
        votes.push({ direction: 'BUY', points: 20 });
        reasons.push('MACD bullish');
      } else if (m && m.macd < m.signal) {
        votes.push({ direction: 'SELL', points: 20 });
        reasons.push('MACD bearish');
      }

      if (votes.length === 0) return hold('No clear technical signals', 50);

      const buy = votes.filter((v) => v.direction === 'BUY').reduce((a, v) => a + v.points, 0);
      const sell = votes.filter((v) => v.direction === 'SELL').reduce((a, v) => a + v.points, 0);
      const rationale = reasons.join('; ');
      if (buy > sell) return createSignal('BUY', Math.min(buy, 100), rationale);
      if (sell > buy) return createSignal('SELL', Math.min(sell, 100), rationale);
      return hold(rationale, 50);
    },
  };
}
