import { closes, createSignal, hold } from './types';
import type { SignalSource } from './types';

function simpleMomentum(prices: number[]): number {
  if (prices.length < 3) return 0;
  const [a, , c] = prices.slice(-3);
  return c - a; // positive if upward momentum
}

export function createMomentumSource(name = 'momentum', confidence = 60): SignalSource {
  return {
    name,
    evaluate: async (snapshot) => {
      const series = closes(snapshot);
      const momentum = simpleMomentum(series);
      if (momentum > 0) return createSignal('BUY', confidence, `upward momentum +${momentum.toFixed(2)} over 3 bars`);
      if (momentum < 0) return createSignal('SELL', confidence, `downward momentum ${momentum.toFixed(2)} over 3 bars`);
      return hold(series.length < 3 ? 'not enough bars for momentum' : 'flat momentum');
    },
  };
}
