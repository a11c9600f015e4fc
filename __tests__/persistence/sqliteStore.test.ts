import type { Trade } from '../../src/engine/types';
import { SqliteStore } from '../../src/persistence/sqlite';
import type { Position } from '../../src/positions/ledger';
import type { RiskState } from '../../src/risk/riskGovernor';
import { SYMBOL } from '../helpers';

const DAY = Date.parse('2024-03-01T10:00:00Z');

function trade(overrides: Partial<Trade> = {}): Trade {
  return {
    symbol: SYMBOL,
    side: 'BUY',
    amount: 0.01,
    entryPrice: 50000,
    exitPrice: null,
    realizedPnl: null,
    signalSnapshot: { direction: 'BUY', confidence: 80, rationale: 'breakout' },
    rationale: 'breakout',
    orderId: 'paper-buy-1',
    simulated: true,
    positionId: 'pos-1',
    timestamp: DAY,
    ...overrides,
  };
}

function position(overrides: Partial<Position> = {}): Position {
  return {
    id: 'pos-1',
    symbol: SYMBOL,
    entryPrice: 50000,
    amount: 0.01,
    stopLossPrice: 47500,
    currentPrice: 50000,
    unrealizedPnl: 0,
    status: 'OPEN',
    openedAt: DAY,
    closedAt: null,
    ...overrides,
  };
}

describe('SqliteStore', () => {
  let store: SqliteStore;

  beforeEach(() => {
    store = new SqliteStore(':memory:');
  });

  afterEach(async () => {
    await store.close();
  });

  it('round-trips trades newest first', async () => {
    await store.saveTrade(trade());
    await store.saveTrade(
      trade({
        side: 'SELL',
        exitPrice: 52000,
        realizedPnl: 20,
        signalSnapshot: null,
        rationale: 'take profit',
        orderId: 'paper-sell-2',
        timestamp: DAY + 1000,
      }),
    );

    const rows = await store.recentTrades(10);
    expect(rows).toHaveLength(2);
    expect(rows[0]).toMatchObject({ side: 'SELL', exitPrice: 52000, realizedPnl: 20, signalSnapshot: null, simulated: true });
    expect(rows[1].signalSnapshot).toEqual({ direction: 'BUY', confidence: 80, rationale: 'breakout' });
    expect(await store.recentTrades(1)).toHaveLength(1);
  });

  it('aggregates daily stats from realized trades', async () => {
    await store.saveTrade(trade());
    await store.saveTrade(trade({ side: 'SELL', realizedPnl: 20, exitPrice: 52000 }));
    await store.saveTrade(trade({ side: 'SELL', realizedPnl: -5, exitPrice: 49500 }));

    expect(await store.dailyStats('2024-03-01')).toEqual({
      date: '2024-03-01',
      totalTrades: 3,
      winningTrades: 1,
      losingTrades: 1,
      totalPnl: 15,
    });
    expect(await store.dailyStats('2024-03-02')).toBeNull();
  });

  it('upserts open positions and never reopens a closed one', async () => {
    await store.savePosition(position());
    await store.savePosition(position({ currentPrice: 51000, unrealizedPnl: 10 }));
    expect(await store.loadOpenPositions()).toEqual([position({ currentPrice: 51000, unrealizedPnl: 10 })]);

    await store.savePosition(position({ status: 'CLOSED', currentPrice: 52000, unrealizedPnl: 20, closedAt: DAY + 5 }));
    await store.savePosition(position());
    expect(await store.loadOpenPositions()).toEqual([]);
  });

  it('persists risk and engine state', async () => {
    const risk: RiskState = {
      startingCapital: 10000,
      dailyRealizedPnl: -30,
      dailyLossPercent: 0.3,
      totalLossPercent: 1.2,
      locked: true,
      lockedAt: DAY,
      dailyAnchorDate: '2024-03-01',
    };
    expect(await store.loadRiskState()).toBeNull();
    await store.saveRiskState(risk);
    expect(await store.loadRiskState()).toEqual(risk);

    await store.saveEngineState({ balance: 9970, realizedPnlTotal: -30, status: 'HALTED', paused: true });
    expect(await store.loadEngineState()).toEqual({ balance: 9970, realizedPnlTotal: -30, status: 'HALTED', paused: true });
  });
});
