import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { PersistedEngineState, Trade } from '../engine/types';
import { createLogger } from '../logger';
import type { Position } from '../positions/ledger';
import type { RiskState } from '../risk/riskGovernor';
import type { Signal } from '../signals/types';
import type { PgMirror } from './pg';
import type { DailyStats, StoredTrade, TradeStore } from './types';

const logger = createLogger('sqlite-store');

const riskStateSchema = z.object({
  startingCapital: z.number(),
  dailyRealizedPnl: z.number(),
  dailyLossPercent: z.number(),
  totalLossPercent: z.number(),
  locked: z.boolean(),
  lockedAt: z.number().nullable(),
  dailyAnchorDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
});

const engineStateSchema = z.object({
  balance: z.number(),
  realizedPnlTotal: z.number(),
  status: z.enum(['IDLE', 'RUNNING', 'HALTED', 'STOPPED']),
  paused: z.boolean().default(false),
});

const signalSchema = z.object({
  direction: z.enum(['BUY', 'SELL', 'HOLD']),
  confidence: z.number(),
  rationale: z.string(),
});

interface TradeRow {
  id: number;
  ts: number;
  symbol: string;
  side: 'BUY' | 'SELL';
  amount: number;
  entry_price: number;
  exit_price: number | null;
  realized_pnl: number | null;
  signal_json: string | null;
  rationale: string;
  order_id: string;
  simulated: number;
  position_id: string;
}

interface PositionRow {
  id: string;
  symbol: string;
  entry_price: number;
  amount: number;
  stop_loss_price: number;
  current_price: number;
  unrealized_pnl: number;
  status: 'OPEN' | 'CLOSED';
  opened_at: number;
  closed_at: number | null;
}

interface DailyStatsRow {
  date: string;
  total_trades: number;
  winning_trades: number;
  losing_trades: number;
  total_pnl: number;
}

function parseSignal(json: string | null): Signal | null {
  if (!json) return null;
  const parsed = signalSchema.safeParse(JSON.parse(json));
  return parsed.success ? parsed.data : null;
}

export class SqliteStore implements TradeStore {
  private readonly db: Database.Database;
  private readonly mirror: PgMirror | null;

  /** `:memory:` keeps everything in process. */
  constructor(dbPath: string, mirror: PgMirror | null = null) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    }
    this.db = new Database(dbPath);
    this.mirror = mirror;
    this.db.exec(`
      PRAGMA journal_mode = WAL;
      CREATE TABLE IF NOT EXISTS trades (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts INTEGER NOT NULL,
        symbol TEXT NOT NULL,
        side TEXT NOT NULL,
        amount REAL NOT NULL,
        entry_price REAL NOT NULL,
        exit_price REAL,
        realized_pnl REAL,
        signal_json TEXT,
        rationale TEXT NOT NULL,
        order_id TEXT NOT NULL,
        simulated INTEGER NOT NULL,
        position_id TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_trades_symbol_ts ON trades(symbol, ts);

      CREATE TABLE IF NOT EXISTS positions (
        id TEXT PRIMARY KEY,
        symbol TEXT NOT NULL,
        entry_price REAL NOT NULL,
        amount REAL NOT NULL,
        stop_loss_price REAL NOT NULL,
        current_price REAL NOT NULL,
        unrealized_pnl REAL NOT NULL,
        status TEXT NOT NULL,
        opened_at INTEGER NOT NULL,
        closed_at INTEGER
      );
      CREATE INDEX IF NOT EXISTS idx_positions_status ON positions(status);

      CREATE TABLE IF NOT EXISTS daily_stats (
        date TEXT PRIMARY KEY,
        total_trades INTEGER NOT NULL,
        winning_trades INTEGER NOT NULL,
        losing_trades INTEGER NOT NULL,
        total_pnl REAL NOT NULL
      );

      CREATE TABLE IF NOT EXISTS meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `);
  }

  async saveTrade(trade: Trade): Promise<void> {
    const date = new Date(trade.timestamp).toISOString().slice(0, 10);
    const pnl = trade.realizedPnl;
    const write = this.db.transaction(() => {
      this.db
        .prepare(
          `INSERT INTO trades (ts, symbol, side, amount, entry_price, exit_price, realized_pnl, signal_json, rationale, order_id, simulated, position_id)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          trade.timestamp,
          trade.symbol,
          trade.side,
          trade.amount,
          trade.entryPrice,
          trade.exitPrice,
          pnl,
          trade.signalSnapshot ? JSON.stringify(trade.signalSnapshot) : null,
          trade.rationale,
          trade.orderId,
          trade.simulated ? 1 : 0,
          trade.positionId,
        );
      this.db
        .prepare(
          `INSERT INTO daily_stats (date, total_trades, winning_trades, losing_trades, total_pnl)
           VALUES (?, 1, ?, ?, ?)
           ON CONFLICT(date) DO UPDATE SET
             total_trades = total_trades + 1,
             winning_trades = winning_trades + excluded.winning_trades,
             losing_trades = losing_trades + excluded.losing_trades,
             total_pnl = total_pnl + excluded.total_pnl`,
        )
        .run(date, pnl !== null && pnl > 0 ? 1 : 0, pnl !== null && pnl < 0 ? 1 : 0, pnl ?? 0);
    });
    write();
    this.mirrored('trade', this.mirror?.insertTrade(trade));
  }

  async savePosition(position: Position): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO positions (id, symbol, entry_price, amount, stop_loss_price, current_price, unrealized_pnl, status, opened_at, closed_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           current_price = excluded.current_price,
           unrealized_pnl = excluded.unrealized_pnl,
           status = excluded.status,
           closed_at = excluded.closed_at
         WHERE positions.status = 'OPEN'`,
      )
      .run(
        position.id,
        position.symbol,
        position.entryPrice,
        position.amount,
        position.stopLossPrice,
        position.currentPrice,
        position.unrealizedPnl,
        position.status,
        position.openedAt,
        position.closedAt,
      );
    this.mirrored('position', this.mirror?.upsertPosition(position));
  }

  async loadOpenPositions(): Promise<Position[]> {
    const rows = this.db
      .prepare(`SELECT * FROM positions WHERE status = 'OPEN' ORDER BY opened_at ASC`)
      .all() as PositionRow[];
    return rows.map((r) => ({
      id: r.id,
      symbol: r.symbol,
      entryPrice: r.entry_price,
      amount: r.amount,
      stopLossPrice: r.stop_loss_price,
      currentPrice: r.current_price,
      unrealizedPnl: r.unrealized_pnl,
      status: r.status,
      openedAt: r.opened_at,
      closedAt: r.closed_at,
    }));
  }

  async saveRiskState(state: RiskState): Promise<void> {
    this.setMeta('risk_state', JSON.stringify(state));
  }

  async loadRiskState(): Promise<RiskState | null> {
    return this.getMeta('risk_state', riskStateSchema);
  }

  async saveEngineState(state: PersistedEngineState): Promise<void> {
    this.setMeta('engine_state', JSON.stringify(state));
  }

  async loadEngineState(): Promise<PersistedEngineState | null> {
    return this.getMeta('engine_state', engineStateSchema);
  }

  async recentTrades(limit: number): Promise<StoredTrade[]> {
    const rows = this.db.prepare(`SELECT * FROM trades ORDER BY ts DESC, id DESC LIMIT ?`).all(limit) as TradeRow[];
    return rows.map((r) => ({
      id: r.id,
      symbol: r.symbol,
      side: r.side,
      amount: r.amount,
      entryPrice: r.entry_price,
      exitPrice: r.exit_price,
      realizedPnl: r.realized_pnl,
      signalSnapshot: parseSignal(r.signal_json),
      rationale: r.rationale,
      orderId: r.order_id,
      simulated: r.simulated === 1,
      positionId: r.position_id,
      timestamp: r.ts,
    }));
  }

  async dailyStats(date: string): Promise<DailyStats | null> {
    const row = this.db.prepare(`SELECT * FROM daily_stats WHERE date = ?`).get(date) as DailyStatsRow | undefined;
    if (!row) return null;
    return {
      date: row.date,
      totalTrades: row.total_trades,
      winningTrades: row.winning_trades,
      losingTrades: row.losing_trades,
      totalPnl: row.total_pnl,
    };
  }

  async close(): Promise<void> {
    this.db.close();
    await this.mirror?.end();
  }

  private setMeta(key: string, value: string): void {
    this.db
      .prepare(
        `INSERT INTO meta (key, value) VALUES (?, ?)
         ON CONFLICT(key) DO UPDATE SET value=excluded.value`,
      )
      .run(key, value);
    this.mirrored(key, this.mirror?.setMeta(key, value));
  }

  private getMeta<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
    const row = this.db.prepare(`SELECT value FROM meta WHERE key = ?`).get(key) as { value: string } | undefined;
    if (!row) return null;
    const parsed = schema.safeParse(JSON.parse(row.value));
    if (!parsed.success) {
      logger.warn({ key, issues: parsed.error.issues.length }, 'ignoring malformed persisted state');
      return null;
    }
    return parsed.data;
  }

  // Mirror writes are best effort.
  private mirrored(what: string, pending: Promise<void> | undefined): void {
    pending?.catch((err: unknown) => logger.warn({ err, what }, 'postgres mirror write failed'));
  }
}
