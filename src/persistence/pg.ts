import { Pool } from 'pg';
import type { Trade } from '../engine/types';
import type { Position } from '../positions/ledger';

/** Optional write-only copy of the audit trail in Postgres, enabled by DATABASE_URL. */
export class PgMirror {
  private readonly pool: Pool;
  private ready: Promise<void> | null = null;

  constructor(connectionString: string) {
    this.pool = new Pool({ connectionString, ssl: { rejectUnauthorized: false } });
  }

  static fromEnv(url: string | undefined): PgMirror | null {
    return url ? new PgMirror(url) : null;
  }

  async insertTrade(t: Trade): Promise<void> {
    await this.ensureSchema();
    await this.pool.query(
      `INSERT INTO trades (ts, symbol, side, amount, entry_price, exit_price, realized_pnl, signal_json, rationale, order_id, simulated, position_id)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12)`,
      [
        t.timestamp,
        t.symbol,
        t.side,
        t.amount,
        t.entryPrice,
        t.exitPrice,
        t.realizedPnl,
        t.signalSnapshot ? JSON.stringify(t.signalSnapshot) : null,
        t.rationale,
        t.orderId,
        t.simulated,
        t.positionId,
      ],
    );
  }

  async upsertPosition(p: Position): Promise<void> {
    await this.ensureSchema();
    await this.pool.query(
      `INSERT INTO positions (id, symbol, entry_price, amount, stop_loss_price, current_price, unrealized_pnl, status, opened_at, closed_at)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10)
       ON CONFLICT (id) DO UPDATE SET
         current_price = EXCLUDED.current_price,
         unrealized_pnl = EXCLUDED.unrealized_pnl,
         status = EXCLUDED.status,
         closed_at = EXCLUDED.closed_at
       WHERE positions.status = 'OPEN'`,
      [p.id, p.symbol, p.entryPrice, p.amount, p.stopLossPrice, p.currentPrice, p.unrealizedPnl, p.status, p.openedAt, p.closedAt],
    );
  }

  async setMeta(key: string, value: string): Promise<void> {
    await this.ensureSchema();
    await this.pool.query(
      `INSERT INTO meta (key, value) VALUES ($1,$2)
       ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value`,
      [key, value],
    );
  }

  async end(): Promise<void> {
    await this.pool.end();
  }

  private ensureSchema(): Promise<void> {
    this.ready ??= this.pool
      .query(
        `
      CREATE TABLE IF NOT EXISTS trades (
        id BIGSERIAL PRIMARY KEY,
        ts BIGINT NOT NULL,
        symbol TEXT NOT NULL,
        side TEXT NOT NULL,
        amount DOUBLE PRECISION NOT NULL,
        entry_price DOUBLE PRECISION NOT NULL,
        exit_price DOUBLE PRECISION,
        realized_pnl DOUBLE PRECISION,
        signal_json TEXT,
        rationale TEXT NOT NULL,
        order_id TEXT NOT NULL,
        simulated BOOLEAN NOT NULL,
        position_id TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_trades_symbol_ts ON trades(symbol, ts);

      CREATE TABLE IF NOT EXISTS positions (
        id TEXT PRIMARY KEY,
        symbol TEXT NOT NULL,
        entry_price DOUBLE PRECISION NOT NULL,
        amount DOUBLE PRECISION NOT NULL,
        stop_loss_price DOUBLE PRECISION NOT NULL,
        current_price DOUBLE PRECISION NOT NULL,
        unrealized_pnl DOUBLE PRECISION NOT NULL,
        status TEXT NOT NULL,
        opened_at BIGINT NOT NULL,
        closed_at BIGINT
      );

      CREATE TABLE IF NOT EXISTS meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `,
      )
      .then(() => undefined)
      .catch((err: unknown) => {
        // retry schema creation on the next write
        this.ready = null;
        throw err;
      });
    return this.ready;
  }
}
