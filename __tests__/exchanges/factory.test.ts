import { loadConfig } from '../../src/config';
import { ConfigError } from '../../src/errors';
import { AlpacaClient } from '../../src/exchanges/alpaca';
import { BinanceClient } from '../../src/exchanges/binance';
import { createExchangeClient, credentialsFor } from '../../src/exchanges/factory';
import { OkxClient } from '../../src/exchanges/okx';
import { createExecutionAdapter } from '../../src/execution/factory';

describe('exchange factory', () => {
  it('builds a public-data client for paper trading without keys', () => {
    const cfg = loadConfig({});
    expect(credentialsFor(cfg)).toBeNull();
    const client = createExchangeClient(cfg);
    expect(client).toBeInstanceOf(OkxClient);
    expect(createExecutionAdapter(cfg, client).mode).toBe('paper');
  });

  it('requires credentials for live trading', () => {
    expect(() => createExchangeClient(loadConfig({ PAPER_TRADING: 'false' }))).toThrow(ConfigError);
  });

  it('needs the OKX passphrase as part of the credentials', () => {
    const cfg = loadConfig({ OKX_API_KEY: 'test-key', OKX_API_SECRET: 'test-secret' });
    expect(credentialsFor(cfg)).toBeNull();
  });

  it('selects the configured venue', () => {
    const live = loadConfig({
      EXCHANGE: 'binanceus',
      PAPER_TRADING: 'false',
      BINANCE_API_KEY: 'test-key',
      BINANCE_API_SECRET: 'test-secret',
    });
    const client = createExchangeClient(live);
    expect(client).toBeInstanceOf(BinanceClient);
    expect(client.venue).toBe('binanceus');
    expect(createExecutionAdapter(live, client).mode).toBe('live');
    expect(createExchangeClient(loadConfig({ EXCHANGE: 'alpaca' }))).toBeInstanceOf(AlpacaClient);
  });
});
