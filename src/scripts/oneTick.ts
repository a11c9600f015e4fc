import 'dotenv/config';
import { createEngine } from '../bootstrap';
import { loadConfig } from '../config';
import { logger } from '../logger';

async function main(): Promise<void> {
  const { orchestrator, store } = await createEngine(loadConfig());
  try {
    const report = await orchestrator.runCycle();
    logger.info({ report }, 'one tick completed');
  } finally {
    await store.close();
  }
}

main().catch((err) => {
  logger.error({ err }, 'oneTick failed');
  process.exit(1);
});
