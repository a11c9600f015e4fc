import type { AppConfig } from '../config';
import type { ExchangeClient } from '../exchanges/types';
import { LiveExecutionAdapter } from './live';
import { PaperExecutionAdapter } from './paper';
import type { ExecutionAdapter } from './types';

export function createExecutionAdapter(cfg: AppConfig, client: ExchangeClient): ExecutionAdapter {
  return cfg.paperTrading ? new PaperExecutionAdapter(cfg.PAPER_REFERENCE_PRICE) : new LiveExecutionAdapter(client);
}
