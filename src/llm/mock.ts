import type { LLMAdapter } from './types';

export function createMockAdapter(id: string): LLMAdapter {
  return {
    id,
    async opine({ price, recentSeries }) {
      // Deterministic: compare against the first close in the window
      const first = recentSeries[0]?.close;
      if (first === undefined || !Number.isFinite(price)) {
        return { direction: 'HOLD', confidence: 0, rationale: 'mock: no data' };
      }
      if (price > first) return { direction: 'BUY', confidence: 55, rationale: 'mock: price above window open' };
      if (price < first) return { direction: 'SELL', confidence: 55, rationale: 'mock: price below window open' };
      return { direction: 'HOLD', confidence: 50, rationale: 'mock: unchanged' };
    },
  };
}
