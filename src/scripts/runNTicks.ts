import 'dotenv/config';
import { createEngine } from '../bootstrap';
import { loadConfig } from '../config';
import { sleep } from '../engine/scheduler';
import { logger } from '../logger';

function getArg(name: string, fallback: string): string {
  const p = process.argv.find((v) => v.startsWith(name + '='));
  return p ? p.slice(name.length + 1) : fallback;
}

async function main(): Promise<void> {
  const count = Number(getArg('--count', '2'));
  const delayMs = Number(getArg('--delay', '10000'));
  const { orchestrator, store } = await createEngine(loadConfig());
  try {
    for (let i = 0; i < count; i++) {
      logger.info({ tick: i + 1, of: count }, 'running tick');
      const report = await orchestrator.runCycle();
      logger.info({ report }, 'tick completed');
      if (report.halted) break;
      if (i < count - 1) await sleep(delayMs);
    }
  } finally {
    await store.close();
  }
  logger.info('runNTicks completed');
}

main().catch((err) => {
  logger.error({ err }, 'runNTicks failed');
  process.exit(1);
});
