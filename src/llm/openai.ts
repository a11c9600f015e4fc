import OpenAI from 'openai';
import { z } from 'zod';
import { InvalidSignalError } from '../errors';
import type { LLMAdapter, LLMOpinion } from './types';

const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export function createOpenAIAdapter(
  id: string,
  apiKey: string,
  model: string,
  provider: 'openai' | 'openrouter' = 'openai',
): LLMAdapter {
  const isOpenRouter = provider === 'openrouter';
  const client = new OpenAI({
    apiKey,
    baseURL: isOpenRouter ? OPENROUTER_BASE_URL : undefined,
    defaultHeaders: isOpenRouter ? { 'X-Title': process.env.OPENROUTER_APP_TITLE ?? 'sentinel-trader' } : undefined,
  });

  return {
    id,
    async opine({ symbol, price, recentSeries }) {
      const system =
        'You are a market analyst for a single instrument. Respond only with a compact JSON object ' +
        '{"direction":"BUY|SELL|HOLD","confidence":0-100,"rationale":"one short sentence"}. Never include anything else.';
      const closes = recentSeries.slice(-30).map((c) => c.close);
      const user = JSON.stringify({ symbol, price, closes });

      const res = await client.chat.completions.create({
        model,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: 'Input:' + user },
        ],
        temperature: Number(process.env.LLM_TEMPERATURE ?? 0.2),
        max_tokens: Number(process.env.LLM_MAX_TOKENS ?? 200),
        response_format: { type: 'json_object' },
      });

      const content = res.choices[0]?.message?.content ?? '';
      return parseOpinion(content);
    },
  };
}

const opinionSchema = z.object({
  direction: z.enum(['BUY', 'SELL', 'HOLD']),
  confidence: z.number().min(0).max(100),
  rationale: z.string(),
});

export function parseOpinion(content: string): LLMOpinion {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new InvalidSignalError(`LLM reply is not JSON: ${content.slice(0, 80)}`);
  }
  const result = opinionSchema.safeParse(parsed);
  if (!result.success) {
    throw new InvalidSignalError(`LLM reply has an invalid shape: ${content.slice(0, 80)}`);
  }
  return result.data;
}
