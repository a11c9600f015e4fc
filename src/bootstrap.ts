import type { AppConfig } from './config';
import { CycleOrchestrator } from './engine/orchestrator';
import { createExchangeClient } from './exchanges/factory';
import type { ExchangeClient } from './exchanges/types';
import { createExecutionAdapter } from './execution/factory';
import { VenueMarketData } from './marketData';
import { EventBus } from './notifications/eventBus';
import { PgMirror } from './persistence/pg';
import { SqliteStore } from './persistence/sqlite';
import { PositionLedger } from './positions/ledger';
import { RiskGovernor } from './risk/riskGovernor';
import { loadStrategiesFromEnv } from './strategyLoader';

export interface Engine {
  orchestrator: CycleOrchestrator;
  client: ExchangeClient;
  store: SqliteStore;
  bus: EventBus;
}

/** Wires every collaborator from config and rehydrates persisted state. */
export async function createEngine(cfg: AppConfig): Promise<Engine> {
  const client = createExchangeClient(cfg);
  const store = new SqliteStore(cfg.DB_PATH, PgMirror.fromEnv(cfg.DATABASE_URL));
  const bus = new EventBus();
  const orchestrator = new CycleOrchestrator(
    {
      aggregator: loadStrategiesFromEnv(cfg),
      risk: new RiskGovernor({
        startingCapital: cfg.INITIAL_CAPITAL,
        positionSizePercent: cfg.POSITION_SIZE_PERCENT,
        dailyLossLimitPercent: cfg.DAILY_LOSS_LIMIT_PERCENT,
        killSwitchPercent: cfg.KILL_SWITCH_PERCENT,
      }),
      ledger: new PositionLedger(),
      execution: createExecutionAdapter(cfg, client),
      marketData: new VenueMarketData(client, { interval: cfg.CANDLE_INTERVAL, limit: cfg.CANDLE_LIMIT }),
      store,
      sink: bus,
    },
    {
      symbol: cfg.TRADING_SYMBOL,
      confidenceThreshold: cfg.CONFIDENCE_THRESHOLD,
      stopLossPercent: cfg.STOP_LOSS_PERCENT,
      pollIntervalMs: cfg.POLL_INTERVAL_MS,
      errorBackoffMs: cfg.ERROR_BACKOFF_MS,
    },
  );
  await orchestrator.restore();
  return { orchestrator, client, store, bus };
}
