import 'dotenv/config';
import { createEngine } from './bootstrap';
import { loadConfig } from './config';
import { logger } from './logger';
import { createServer } from './server';

async function main(): Promise<void> {
  const cfg = loadConfig();
  logger.info(
    { symbol: cfg.TRADING_SYMBOL, exchange: cfg.EXCHANGE, paper: cfg.paperTrading, testnet: cfg.testnet },
    'sentinel-trader starting',
  );
  const { orchestrator, store, bus } = await createEngine(cfg);

  const server = cfg.httpEnabled ? createServer(orchestrator, store, bus) : null;
  server?.listen(cfg.PORT, () => logger.info({ port: cfg.PORT }, 'http server listening'));

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'shutting down');
    orchestrator.stop();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await orchestrator.start();
  server?.closeAllConnections();
  server?.close();
  await store.close();
}

main().catch((err) => {
  logger.fatal({ err }, 'fatal error');
  process.exit(1);
});
