import type { PersistedEngineState, Trade } from '../engine/types';
import type { Position } from '../positions/ledger';
import type { RiskState } from '../risk/riskGovernor';

export interface StoredTrade extends Trade {
  id: number;
}

export interface DailyStats {
  date: string;
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  totalPnl: number;
}

/** Persistence collaborator. Trades are append-only; positions are upserted by id. */
export interface TradeStore {
  saveTrade(trade: Trade): Promise<void>;
  savePosition(position: Position): Promise<void>;
  loadOpenPositions(): Promise<Position[]>;
  saveRiskState(state: RiskState): Promise<void>;
  loadRiskState(): Promise<RiskState | null>;
  saveEngineState(state: PersistedEngineState): Promise<void>;
  loadEngineState(): Promise<PersistedEngineState | null>;
  recentTrades(limit: number): Promise<StoredTrade[]>;
  dailyStats(date: string): Promise<DailyStats | null>;
  close(): Promise<void>;
}
