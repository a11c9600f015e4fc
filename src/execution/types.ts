import type { OrderSide } from '../exchanges/types';

export type { OrderSide };

export interface OrderResult {
  id: string;
  symbol: string;
  side: OrderSide;
  type: 'market' | 'stop';
  amount: number;
  fillPrice: number;
  status: string;
  simulated: boolean;
}

/** Order placement as the engine sees it. Failures reject with an ExchangeError. */
export interface ExecutionAdapter {
  readonly mode: 'paper' | 'live';
  buy(symbol: string, amount: number): Promise<OrderResult>;
  sell(symbol: string, amount: number): Promise<OrderResult>;
  placeStopLoss(symbol: string, amount: number, stopPrice: number): Promise<OrderResult>;
  currentPrice(symbol: string): Promise<number>;
  /** Latest market price seen by the engine. Only the paper adapter uses it. */
  observePrice(symbol: string, price: number): void;
}
