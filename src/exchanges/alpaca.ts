import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { ExchangeError } from '../errors';
import type { Candle } from '../signals/types';
import { HTTP_TIMEOUT_MS, formatPrice, formatQuantity, toNumber, venueCall } from './http';
import type { ExchangeClient, OrderSide, VenueCredentials, VenueOrder } from './types';

export const ALPACA_PAPER_BASE = 'https://paper-api.alpaca.markets';
export const ALPACA_LIVE_BASE = 'https://api.alpaca.markets';
export const ALPACA_DATA_BASE = 'https://data.alpaca.markets';

export type OrderType = 'market' | 'stop';

export interface PlaceOrderRequest {
  symbol: string;
  side: OrderSide;
  type: OrderType;
  time_in_force: 'day' | 'gtc';
  qty: string;
  stop_price?: string;
}

export interface PlaceOrderResponse {
  id: string;
  status: string;
  symbol: string;
  side: OrderSide;
  filled_qty: string;
  filled_avg_price: string | null;
}

interface AlpacaBar {
  t: string;
  o: number;
  h: number;
  l: number;
  c: number;
  v: number;
}

/** Crypto pairs are written BASE/QUOTE; Alpaca quotes crypto in USD. */
export function isCrypto(symbol: string): boolean {
  return symbol.includes('/');
}

export function alpacaSymbol(symbol: string): string {
  return symbol.toUpperCase().replace(/\/USDT$/, '/USD');
}

const TIMEFRAME_UNITS: Record<string, string> = { m: 'Min', h: 'Hour', d: 'Day' };

/** 1m -> 1Min, 1h -> 1Hour, 1d -> 1Day */
export function alpacaTimeframe(interval: string): string {
  const m = /^([0-9]+)([mhd])$/i.exec(interval);
  if (!m) return interval;
  return `${m[1]}${TIMEFRAME_UNITS[m[2].toLowerCase()] ?? ''}`;
}

export function alpacaMarketOrder(symbol: string, side: OrderSide, amount: number): PlaceOrderRequest {
  return {
    symbol: alpacaSymbol(symbol),
    side,
    type: 'market',
    time_in_force: isCrypto(symbol) ? 'gtc' : 'day',
    qty: formatQuantity(amount),
  };
}

export function alpacaStopOrder(symbol: string, side: OrderSide, amount: number, stopPrice: number): PlaceOrderRequest {
  return {
    symbol: alpacaSymbol(symbol),
    side,
    type: 'stop',
    time_in_force: 'gtc',
    qty: formatQuantity(amount),
    stop_price: formatPrice(stopPrice),
  };
}

export class AlpacaClient implements ExchangeClient {
  readonly venue = 'alpaca' as const;
  private readonly trading: AxiosInstance;
  private readonly data: AxiosInstance;
  private readonly hasKeys: boolean;

  constructor(opts: { testnet: boolean; creds: VenueCredentials | null }) {
    const headers = {
      'APCA-API-KEY-ID': opts.creds?.apiKey ?? '',
      'APCA-API-SECRET-KEY': opts.creds?.apiSecret ?? '',
    };
    this.hasKeys = Boolean(opts.creds);
    this.trading = axios.create({
      baseURL: opts.testnet ? ALPACA_PAPER_BASE : ALPACA_LIVE_BASE,
      headers,
      timeout: HTTP_TIMEOUT_MS,
    });
    this.data = axios.create({ baseURL: ALPACA_DATA_BASE, headers, timeout: HTTP_TIMEOUT_MS });
  }

  createMarketOrder(symbol: string, side: OrderSide, amount: number): Promise<VenueOrder> {
    return venueCall(this.venue, `market ${side}`, () => this.placeOrder(alpacaMarketOrder(symbol, side, amount)));
  }

  createStopOrder(symbol: string, side: OrderSide, amount: number, stopPrice: number): Promise<VenueOrder> {
    return venueCall(this.venue, 'stop-loss', () => this.placeOrder(alpacaStopOrder(symbol, side, amount, stopPrice)));
  }

  fetchTicker(symbol: string): Promise<number> {
    return venueCall(this.venue, 'latest trade', async () => {
      const sym = alpacaSymbol(symbol);
      if (isCrypto(symbol)) {
        const res = await this.data.get<{ trades: Record<string, { p: number }> }>('/v1beta3/crypto/us/latest/trades', {
          params: { symbols: sym },
        });
        return toNumber(res.data.trades[sym]?.p, `latest price for ${symbol}`);
      }
      const res = await this.data.get<{ trade?: { p: number } }>(`/v2/stocks/${encodeURIComponent(sym)}/trades/latest`);
      return toNumber(res.data.trade?.p, `latest price for ${symbol}`);
    });
  }

  fetchCandles(symbol: string, interval: string, limit: number): Promise<Candle[]> {
    return venueCall(this.venue, 'bars', async () => {
      const sym = alpacaSymbol(symbol);
      const params = { timeframe: alpacaTimeframe(interval), limit };
      let bars: AlpacaBar[];
      if (isCrypto(symbol)) {
        const res = await this.data.get<{ bars: Record<string, AlpacaBar[]> }>('/v1beta3/crypto/us/bars', {
          params: { ...params, symbols: sym },
        });
        bars = res.data.bars[sym] ?? [];
      } else {
        const res = await this.data.get<{ bars: AlpacaBar[] | null }>(`/v2/stocks/${encodeURIComponent(sym)}/bars`, {
          params,
        });
        bars = res.data.bars ?? [];
      }
      return bars.map((b) => ({ openTime: Date.parse(b.t), open: b.o, high: b.h, low: b.l, close: b.c, volume: b.v }));
    });
  }

  private async placeOrder(body: PlaceOrderRequest): Promise<VenueOrder> {
    if (!this.hasKeys) throw new ExchangeError(this.venue, 'API key id and secret are required');
    const res = await this.trading.post<PlaceOrderResponse>('/v2/orders', body);
    const avg = res.data.filled_avg_price === null ? NaN : Number(res.data.filled_avg_price);
    return {
      id: res.data.id,
      status: res.data.status,
      filledAmount: Number(res.data.filled_qty) || 0,
      avgPrice: Number.isFinite(avg) && avg > 0 ? avg : null,
    };
  }
}
