import 'dotenv/config';
import { loadConfig } from '../config';
import { createExchangeClient, credentialsFor } from '../exchanges/factory';
import { logger } from '../logger';

async function main(): Promise<void> {
  const cfg = loadConfig();
  if (!credentialsFor(cfg)) logger.warn({ exchange: cfg.EXCHANGE }, 'no API keys in env; checking public market data only');
  const client = createExchangeClient(cfg);
  const [price, candles] = await Promise.all([
    client.fetchTicker(cfg.TRADING_SYMBOL),
    client.fetchCandles(cfg.TRADING_SYMBOL, cfg.CANDLE_INTERVAL, 5),
  ]);
  logger.info(
    { exchange: cfg.EXCHANGE, testnet: cfg.testnet, symbol: cfg.TRADING_SYMBOL, price, candles: candles.length },
    'exchange reachable',
  );
}

main().catch((err) => {
  logger.error({ err }, 'exchange ping failed');
  process.exit(1);
});
