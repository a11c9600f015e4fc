import type { Candle, SignalDirection } from '../signals/types';

export type LLMProvider = 'openai' | 'openrouter' | 'mock';

export interface LLMOpinion {
  direction: SignalDirection;
  confidence: number;
  rationale: string;
}

export interface LLMAdapter {
  id: string;
  opine(input: { symbol: string; price: number; recentSeries: Candle[] }): Promise<LLMOpinion>;
}
