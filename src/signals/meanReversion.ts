import { createSignal, hold } from './types';
import type { SignalSource } from './types';
import { sma } from './indicators';

export function createMeanReversionSource(
  name = 'mean-reversion',
  opts: { period?: number; threshold?: number; confidence?: number } = {},
): SignalSource {
  const period = opts.period ?? 10;
  const threshold = opts.threshold ?? 0.003;
  const confidence = opts.confidence ?? 60;
  return {
    name,
    evaluate: async ({ price, recentSeries }) => {
      const avg = sma(
        recentSeries.map((c) => c.close),
        period,
      );
      if (avg == null) return hold(`fewer than ${period} bars for mean reversion`);
      const deviation = (price - avg) / avg;
      const pct = (deviation * 100).toFixed(2);
      if (deviation < -threshold) return createSignal('BUY', confidence, `price ${pct}% below SMA${period}`);
      if (deviation > threshold) return createSignal('SELL', confidence, `price ${pct}% above SMA${period}`);
      return hold(`price within ${(threshold * 100).toFixed(2)}% of SMA${period}`);
    },
  };
}
