import { loadConfig, strategyWeightKey } from '../src/config';
import { ConfigError } from '../src/errors';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const cfg = loadConfig({});
    expect(cfg).toMatchObject({
      TRADING_SYMBOL: 'BTC/USDT',
      EXCHANGE: 'okx',
      INITIAL_CAPITAL: 10000,
      POSITION_SIZE_PERCENT: 5,
      DAILY_LOSS_LIMIT_PERCENT: 15,
      KILL_SWITCH_PERCENT: 50,
      STOP_LOSS_PERCENT: 5,
      CONFIDENCE_THRESHOLD: 70,
      POLL_INTERVAL_MS: 300000,
      ERROR_BACKOFF_MS: 60000,
      CANDLE_INTERVAL: '1h',
      CANDLE_LIMIT: 100,
      PORT: 5000,
      paperTrading: true,
      testnet: true,
      httpEnabled: true,
      strategyList: ['technical-indicators'],
      strategyWeights: {},
    });
  });

  it('coerces numbers and flags from strings', () => {
    const cfg = loadConfig({
      INITIAL_CAPITAL: '2500',
      PAPER_TRADING: 'FALSE',
      EXCHANGE: 'binanceus',
      STRATEGIES: 'Momentum, mean-reversion,momentum',
      STRATEGY_MOMENTUM_WEIGHT: '0.6',
    });
    expect(cfg.INITIAL_CAPITAL).toBe(2500);
    expect(cfg.paperTrading).toBe(false);
    expect(cfg.EXCHANGE).toBe('binanceus');
    expect(cfg.strategyList).toEqual(['momentum', 'mean-reversion']);
    expect(cfg.strategyWeights).toEqual({ momentum: 0.6 });
  });

  it('lists every invalid key', () => {
    expect(() => loadConfig({ EXCHANGE: 'kraken', POSITION_SIZE_PERCENT: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ EXCHANGE: 'kraken', POSITION_SIZE_PERCENT: '0' })).toThrow(
      /Invalid configuration: EXCHANGE: .*; POSITION_SIZE_PERCENT: /,
    );
  });

  it('rejects strategy weights outside [0, 1]', () => {
    expect(() => loadConfig({ STRATEGIES: 'momentum', STRATEGY_MOMENTUM_WEIGHT: '1.5' })).toThrow(
      'Invalid configuration: STRATEGY_MOMENTUM_WEIGHT must be between 0 and 1',
    );
  });

  it('derives weight keys from strategy names', () => {
    expect(strategyWeightKey('technical-indicators')).toBe('STRATEGY_TECHNICAL_INDICATORS_WEIGHT');
  });
});
