import type { ExecutionAdapter, OrderResult, OrderSide } from './types';

/**
 * Synthetic fills at a reference price. The reference starts at the configured
 * value and follows the last market price the engine observed for the symbol.
 */
export class PaperExecutionAdapter implements ExecutionAdapter {
  readonly mode = 'paper' as const;
  private readonly referencePrice: number;
  private readonly observed = new Map<string, number>();
  private seq = 0;

  constructor(referencePrice: number) {
    this.referencePrice = referencePrice;
  }

  async buy(symbol: string, amount: number): Promise<OrderResult> {
    return this.fill(symbol, 'buy', amount);
  }

  async sell(symbol: string, amount: number): Promise<OrderResult> {
    return this.fill(symbol, 'sell', amount);
  }

  async placeStopLoss(symbol: string, amount: number, stopPrice: number): Promise<OrderResult> {
    return {
      id: this.nextId('stop'),
      symbol,
      side: 'sell',
      type: 'stop',
      amount,
      fillPrice: stopPrice,
      status: 'accepted',
      simulated: true,
    };
  }

  async currentPrice(symbol: string): Promise<number> {
    return this.priceFor(symbol);
  }

  observePrice(symbol: string, price: number): void {
    if (Number.isFinite(price) && price > 0) this.observed.set(symbol, price);
  }

  private fill(symbol: string, side: OrderSide, amount: number): OrderResult {
    return {
      id: this.nextId(side),
      symbol,
      side,
      type: 'market',
      amount,
      fillPrice: this.priceFor(symbol),
      status: 'filled',
      simulated: true,
    };
  }

  private priceFor(symbol: string): number {
    return this.observed.get(symbol) ?? this.referencePrice;
  }

  private nextId(kind: string): string {
    this.seq += 1;
    return `paper-${kind}-${this.seq}`;
  }
}
