import type { AppConfig } from './config';
import { ConfigError } from './errors';
import { createMockAdapter } from './llm/mock';
import { createOpenAIAdapter } from './llm/openai';
import type { LLMAdapter } from './llm/types';
import { createLogger } from './logger';
import { SignalAggregator } from './signals/aggregator';
import { createLLMOpinionSource } from './signals/llmOpinion';
import { createMeanReversionSource } from './signals/meanReversion';
import { createMomentumSource } from './signals/momentum';
import { createTechnicalIndicatorsSource } from './signals/technicalIndicators';
import type { SignalSource } from './signals/types';

const logger = createLogger('strategy-loader');

export const DEFAULT_WEIGHTS: Record<string, number> = {
  'technical-indicators': 0.3,
  momentum: 0.3,
  'mean-reversion': 0.2,
  'llm-opinion': 0.2,
};

export const KNOWN_STRATEGIES = Object.keys(DEFAULT_WEIGHTS);

type StrategyConfig = Pick<
  AppConfig,
  'strategyList' | 'strategyWeights' | 'LLM_PROVIDER' | 'LLM_MODEL' | 'LLM_API_KEY' | 'LLM_MIN_CALL_INTERVAL_MS'
>;

function createLLM(cfg: StrategyConfig): LLMAdapter {
  const provider = cfg.LLM_PROVIDER ?? 'mock';
  if (provider === 'mock') return createMockAdapter('mock');
  if (!cfg.LLM_MODEL || !cfg.LLM_API_KEY) {
    logger.warn({ provider }, 'missing LLM model/key; falling back to mock opinions');
    return createMockAdapter('mock');
  }
  return createOpenAIAdapter(cfg.LLM_MODEL, cfg.LLM_API_KEY, cfg.LLM_MODEL, provider);
}

function createSource(name: string, cfg: StrategyConfig): SignalSource {
  switch (name) {
    case 'technical-indicators':
      return createTechnicalIndicatorsSource(name);
    case 'momentum':
      return createMomentumSource(name);
    case 'mean-reversion':
      return createMeanReversionSource(name);
    case 'llm-opinion':
      return createLLMOpinionSource(name, createLLM(cfg), cfg.LLM_MIN_CALL_INTERVAL_MS);
    default:
      throw new ConfigError(`Unknown strategy "${name}"; expected one of ${KNOWN_STRATEGIES.join(', ')}`);
  }
}

export function loadStrategiesFromEnv(cfg: StrategyConfig): SignalAggregator {
  const aggregator = new SignalAggregator();
  for (const name of cfg.strategyList) {
    const weight = cfg.strategyWeights[name] ?? DEFAULT_WEIGHTS[name] ?? 1;
    aggregator.register(createSource(name, cfg), weight);
  }
  if (cfg.strategyList.length === 0) logger.warn('no strategies configured; every cycle will HOLD');
  logger.info({ strategies: aggregator.sources() }, 'strategies loaded');
  return aggregator;
}
