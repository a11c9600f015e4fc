import type { Position } from '../positions/ledger';
import type { RiskState } from '../risk/riskGovernor';
import type { Signal } from '../signals/types';
import type { SourceInfo } from '../signals/aggregator';

export type EngineStatus = 'IDLE' | 'RUNNING' | 'HALTED' | 'STOPPED';

export type TradeSide = 'BUY' | 'SELL';

/** Append-only audit record, one per executed order. */
export interface Trade {
  symbol: string;
  side: TradeSide;
  amount: number;
  entryPrice: number;
  exitPrice: number | null;
  realizedPnl: number | null;
  signalSnapshot: Signal | null;
  rationale: string;
  orderId: string;
  simulated: boolean;
  positionId: string;
  timestamp: number;
}

/** Engine-wide mutable state. Owned and written only by the orchestrator. */
export interface EngineContext {
  symbol: string;
  balance: number;
  realizedPnlTotal: number;
  status: EngineStatus;
  paused: boolean;
  cycle: number;
  lastSignal: Signal | null;
  lastPrice: number | null;
  lastCycleAt: number | null;
  lastError: string | null;
}

export interface PersistedEngineState {
  balance: number;
  realizedPnlTotal: number;
  status: EngineStatus;
  paused: boolean;
}

export interface EngineStatusSnapshot {
  context: Readonly<EngineContext>;
  risk: Readonly<RiskState>;
  openPositions: Position[];
  strategies: SourceInfo[];
  equity: number;
}
