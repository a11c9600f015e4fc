import type { Venue } from '../config';
import type { Candle } from '../signals/types';

export type OrderSide = 'buy' | 'sell';

export interface VenueOrder {
  id: string;
  status: string;
  filledAmount: number;
  /** null when the venue did not report a fill price in the order response */
  avgPrice: number | null;
}

export interface VenueCredentials {
  apiKey: string;
  apiSecret: string;
  passphrase?: string;
}

/**
 * Unified exchange capability. Each implementation maps these calls onto its
 * venue's wire format, including the venue's own stop-order shape.
 */
export interface ExchangeClient {
  readonly venue: Venue;
  createMarketOrder(symbol: string, side: OrderSide, amount: number): Promise<VenueOrder>;
  createStopOrder(symbol: string, side: OrderSide, amount: number, stopPrice: number): Promise<VenueOrder>;
  fetchTicker(symbol: string): Promise<number>;
  fetchCandles(symbol: string, interval: string, limit: number): Promise<Candle[]>;
}
