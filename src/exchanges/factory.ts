import type { AppConfig } from '../config';
import { ConfigError } from '../errors';
import { AlpacaClient } from './alpaca';
import { BinanceClient } from './binance';
import { OkxClient } from './okx';
import type { ExchangeClient, VenueCredentials } from './types';

export function credentialsFor(cfg: AppConfig): VenueCredentials | null {
  switch (cfg.EXCHANGE) {
    case 'okx':
      return cfg.OKX_API_KEY && cfg.OKX_API_SECRET && cfg.OKX_API_PASSPHRASE
        ? { apiKey: cfg.OKX_API_KEY, apiSecret: cfg.OKX_API_SECRET, passphrase: cfg.OKX_API_PASSPHRASE }
        : null;
    case 'binance':
    case 'binanceus':
      return cfg.BINANCE_API_KEY && cfg.BINANCE_API_SECRET
        ? { apiKey: cfg.BINANCE_API_KEY, apiSecret: cfg.BINANCE_API_SECRET }
        : null;
    case 'alpaca':
      return cfg.ALPACA_API_KEY_ID && cfg.ALPACA_API_SECRET_KEY
        ? { apiKey: cfg.ALPACA_API_KEY_ID, apiSecret: cfg.ALPACA_API_SECRET_KEY }
        : null;
  }
}

/**
 * Picks the venue client once, at startup. Paper trading only needs public market
 * data, so credentials are optional there; live trading refuses to start without them.
 */
export function createExchangeClient(cfg: AppConfig): ExchangeClient {
  const creds = credentialsFor(cfg);
  if (!cfg.paperTrading && !creds) {
    throw new ConfigError(`Live trading on ${cfg.EXCHANGE} requires API credentials`);
  }
  switch (cfg.EXCHANGE) {
    case 'okx':
      return new OkxClient({ testnet: cfg.testnet, creds });
    case 'binance':
      return new BinanceClient({ testnet: cfg.testnet, creds });
    case 'binanceus':
      return new BinanceClient({ us: true, testnet: cfg.testnet, creds });
    case 'alpaca':
      return new AlpacaClient({ testnet: cfg.testnet, creds });
  }
}
