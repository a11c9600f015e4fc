import { randomUUID } from 'crypto';
import { PositionStateError } from '../errors';

export type PositionStatus = 'OPEN' | 'CLOSED';

export interface Position {
  id: string;
  symbol: string;
  entryPrice: number;
  amount: number;
  stopLossPrice: number;
  currentPrice: number;
  /** Realized once status is CLOSED. */
  unrealizedPnl: number;
  status: PositionStatus;
  openedAt: number;
  closedAt: number | null;
}

// Keeps (52000 - 50000) * 0.01 at exactly 20.
function roundPnl(v: number): number {
  return Math.round(v * 1e8) / 1e8;
}

export function pnlAt(position: Pick<Position, 'entryPrice' | 'amount'>, price: number): number {
  return roundPnl((price - position.entryPrice) * position.amount);
}

/** Closed positions kept in memory; older ones live only in the store. */
export const CLOSED_HISTORY_LIMIT = 100;

/** Long-only position book. At most one OPEN position per symbol. */
export class PositionLedger {
  private readonly openBySymbol = new Map<string, Position>();
  private readonly closed: Position[] = [];
  private readonly newId: () => string;
  private readonly closedLimit: number;

  constructor(opts: { newId?: () => string; closedLimit?: number } = {}) {
    this.newId = opts.newId ?? randomUUID;
    this.closedLimit = opts.closedLimit ?? CLOSED_HISTORY_LIMIT;
  }

  open(symbol: string, entryPrice: number, amount: number, stopLossPrice: number): Position {
    if (this.openFor(symbol)) {
      throw new PositionStateError(`Position already open for ${symbol}`);
    }
    if (!(entryPrice > 0) || !(amount > 0)) {
      throw new PositionStateError(`Invalid position: price=${entryPrice} amount=${amount}`);
    }
    const position: Position = {
      id: this.newId(),
      symbol,
      entryPrice,
      amount,
      stopLossPrice,
      currentPrice: entryPrice,
      unrealizedPnl: 0,
      status: 'OPEN',
      openedAt: Date.now(),
      closedAt: null,
    };
    this.openBySymbol.set(symbol, position);
    return position;
  }

  /** Loads positions persisted by a previous run. */
  hydrate(saved: Position[]): void {
    for (const p of saved) {
      if (p.status !== 'OPEN') {
        this.remember(Object.freeze({ ...p }));
        continue;
      }
      if (this.openFor(p.symbol)) {
        throw new PositionStateError(`Cannot hydrate second open position for ${p.symbol}`);
      }
      this.openBySymbol.set(p.symbol, { ...p });
    }
  }

  revalue(position: Position, currentPrice: number): number {
    if (position.status !== 'OPEN') {
      throw new PositionStateError(`Cannot revalue closed position ${position.id}`);
    }
    const pnl = pnlAt(position, currentPrice);
    position.currentPrice = currentPrice;
    position.unrealizedPnl = pnl;
    return pnl;
  }

  close(position: Position, exitPrice: number): number {
    if (position.status !== 'OPEN' || this.openBySymbol.get(position.symbol) !== position) {
      throw new PositionStateError(`Position ${position.id} is not open`);
    }
    const realized = pnlAt(position, exitPrice);
    const closed: Position = {
      ...position,
      currentPrice: exitPrice,
      unrealizedPnl: realized,
      status: 'CLOSED',
      closedAt: Date.now(),
    };
    // Callers holding the old reference see the closed state too.
    Object.assign(position, closed);
    Object.freeze(position);
    this.openBySymbol.delete(position.symbol);
    this.remember(position);
    return realized;
  }

  openPositions(): Position[] {
    return [...this.openBySymbol.values()];
  }

  /** Most recent closes, oldest first, up to the history limit. */
  closedPositions(): Position[] {
    return [...this.closed];
  }

  openFor(symbol: string): Position | undefined {
    return this.openBySymbol.get(symbol);
  }

  find(id: string): Position | undefined {
    return this.openPositions().find((p) => p.id === id) ?? this.closed.find((p) => p.id === id);
  }

  checkStopLossBreaches(priceBySymbol: Record<string, number>): Position[] {
    return this.openPositions().filter((p) => {
      const price = priceBySymbol[p.symbol];
      return price !== undefined && price <= p.stopLossPrice;
    });
  }

  totalUnrealizedPnl(): number {
    return roundPnl(this.openPositions().reduce((acc, p) => acc + p.unrealizedPnl, 0));
  }

  marketValue(): number {
    return this.openPositions().reduce((acc, p) => acc + p.currentPrice * p.amount, 0);
  }

  private remember(position: Position): void {
    this.closed.push(position);
    if (this.closed.length > this.closedLimit) this.closed.splice(0, this.closed.length - this.closedLimit);
  }
}
