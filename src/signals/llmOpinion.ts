import { createSignal } from './types';
import type { Signal, SignalSource } from './types';
import type { LLMAdapter } from '../llm/types';

/**
 * Wraps an LLM adapter as a signal source. Calls are throttled to one per
 * `minCallIntervalMs`; in between, the last opinion is replayed.
 */
export function createLLMOpinionSource(
  name: string,
  llm: LLMAdapter,
  minCallIntervalMs = 0,
  now: () => number = Date.now,
): SignalSource {
  let last: { at: number; signal: Signal } | null = null;
  return {
    name,
    evaluate: async ({ symbol, price, recentSeries }) => {
      const t = now();
      if (last && t - last.at < minCallIntervalMs) return last.signal;
      const opinion = await llm.opine({ symbol, price, recentSeries });
      const signal = createSignal(opinion.direction, opinion.confidence, `${llm.id}: ${opinion.rationale}`);
      last = { at: t, signal };
      return signal;
    },
  };
}
