import { createLogger } from '../logger';
import type { ExchangeClient } from '../exchanges/types';
import type { ExecutionAdapter, OrderResult, OrderSide } from './types';

const logger = createLogger('execution');

/** Delegates to a venue client. Errors propagate to the orchestrator untouched. */
export class LiveExecutionAdapter implements ExecutionAdapter {
  readonly mode = 'live' as const;
  private readonly client: ExchangeClient;

  constructor(client: ExchangeClient) {
    this.client = client;
  }

  buy(symbol: string, amount: number): Promise<OrderResult> {
    return this.market(symbol, 'buy', amount);
  }

  sell(symbol: string, amount: number): Promise<OrderResult> {
    return this.market(symbol, 'sell', amount);
  }

  async placeStopLoss(symbol: string, amount: number, stopPrice: number): Promise<OrderResult> {
    const order = await this.client.createStopOrder(symbol, 'sell', amount, stopPrice);
    logger.info({ venue: this.client.venue, orderId: order.id, stopPrice }, 'stop-loss placed');
    return {
      id: order.id,
      symbol,
      side: 'sell',
      type: 'stop',
      amount,
      fillPrice: stopPrice,
      status: order.status,
      simulated: false,
    };
  }

  currentPrice(symbol: string): Promise<number> {
    return this.client.fetchTicker(symbol);
  }

  observePrice(): void {
    // live fills come from the venue
  }

  private async market(symbol: string, side: OrderSide, amount: number): Promise<OrderResult> {
    const order = await this.client.createMarketOrder(symbol, side, amount);
    // Some venues acknowledge before filling; fall back to the last traded price.
    const fillPrice = order.avgPrice ?? (await this.client.fetchTicker(symbol));
    logger.info({ venue: this.client.venue, orderId: order.id, side, amount, fillPrice }, 'market order placed');
    return {
      id: order.id,
      symbol,
      side,
      type: 'market',
      amount: order.filledAmount > 0 ? order.filledAmount : amount,
      fillPrice,
      status: order.status,
      simulated: false,
    };
  }
}
