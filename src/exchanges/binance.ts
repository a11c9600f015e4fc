import axios from 'axios';
import type { AxiosInstance } from 'axios';
import crypto from 'crypto';
import { ExchangeError } from '../errors';
import type { Candle } from '../signals/types';
import { HTTP_TIMEOUT_MS, formatPrice, formatQuantity, toNumber, venueCall } from './http';
import type { ExchangeClient, OrderSide, VenueCredentials, VenueOrder } from './types';

export const BINANCE_TESTNET_BASE = 'https://testnet.binance.vision';
export const BINANCE_BASE = 'https://api.binance.com';
export const BINANCE_US_BASE = 'https://api.binance.us';

export function binanceSymbol(symbol: string): string {
  return symbol.replace(/[^A-Za-z0-9]/g, '').toUpperCase();
}

export function binanceMarketOrderParams(symbol: string, side: OrderSide, amount: number): Record<string, string> {
  return {
    symbol: binanceSymbol(symbol),
    side: side.toUpperCase(),
    type: 'MARKET',
    quantity: formatQuantity(amount),
    newOrderRespType: 'FULL',
  };
}

export function binanceStopOrderParams(
  symbol: string,
  side: OrderSide,
  amount: number,
  stopPrice: number,
): Record<string, string> {
  return {
    symbol: binanceSymbol(symbol),
    side: side.toUpperCase(),
    type: 'STOP_LOSS',
    quantity: formatQuantity(amount),
    stopPrice: formatPrice(stopPrice),
  };
}

export function signQuery(query: string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(query).digest('hex');
}

interface BinanceOrderResponse {
  orderId: number;
  status: string;
  executedQty?: string;
  cummulativeQuoteQty?: string;
}

export class BinanceClient implements ExchangeClient {
  readonly venue: 'binance' | 'binanceus';
  private readonly http: AxiosInstance;
  private readonly creds: VenueCredentials | null;

  constructor(opts: { us?: boolean; testnet: boolean; creds: VenueCredentials | null; baseURL?: string }) {
    this.venue = opts.us ? 'binanceus' : 'binance';
    const baseURL = opts.baseURL ?? (opts.us ? BINANCE_US_BASE : opts.testnet ? BINANCE_TESTNET_BASE : BINANCE_BASE);
    this.http = axios.create({ baseURL, timeout: HTTP_TIMEOUT_MS });
    this.creds = opts.creds;
  }

  createMarketOrder(symbol: string, side: OrderSide, amount: number): Promise<VenueOrder> {
    return venueCall(this.venue, `market ${side}`, async () =>
      toVenueOrder(await this.signedPost(binanceMarketOrderParams(symbol, side, amount))),
    );
  }

  createStopOrder(symbol: string, side: OrderSide, amount: number, stopPrice: number): Promise<VenueOrder> {
    return venueCall(this.venue, 'stop-loss', async () =>
      toVenueOrder(await this.signedPost(binanceStopOrderParams(symbol, side, amount, stopPrice))),
    );
  }

  fetchTicker(symbol: string): Promise<number> {
    return venueCall(this.venue, 'ticker', async () => {
      const res = await this.http.get<{ price: string }>('/api/v3/ticker/price', {
        params: { symbol: binanceSymbol(symbol) },
      });
      return toNumber(res.data.price, `price for ${symbol}`);
    });
  }

  fetchCandles(symbol: string, interval: string, limit: number): Promise<Candle[]> {
    return venueCall(this.venue, 'klines', async () => {
      const res = await this.http.get<unknown[][]>('/api/v3/klines', {
        params: { symbol: binanceSymbol(symbol), interval, limit },
      });
      return res.data.map((k) => ({
        openTime: toNumber(k[0], 'kline open time'),
        open: toNumber(k[1], 'kline open'),
        high: toNumber(k[2], 'kline high'),
        low: toNumber(k[3], 'kline low'),
        close: toNumber(k[4], 'kline close'),
        volume: toNumber(k[5], 'kline volume'),
      }));
    });
  }

  private async signedPost(params: Record<string, string>): Promise<BinanceOrderResponse> {
    if (!this.creds) throw new ExchangeError(this.venue, 'API credentials are not configured');
    const payload = new URLSearchParams({ ...params, recvWindow: '5000', timestamp: String(Date.now()) });
    payload.append('signature', signQuery(payload.toString(), this.creds.apiSecret));
    const res = await this.http.post<BinanceOrderResponse>('/api/v3/order', payload.toString(), {
      headers: {
        'X-MBX-APIKEY': this.creds.apiKey,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
    });
    return res.data;
  }
}

function toVenueOrder(data: BinanceOrderResponse): VenueOrder {
  const filled = Number(data.executedQty ?? 0);
  const quote = Number(data.cummulativeQuoteQty ?? 0);
  return {
    id: String(data.orderId),
    status: data.status,
    filledAmount: Number.isFinite(filled) ? filled : 0,
    avgPrice: filled > 0 && quote > 0 ? quote / filled : null,
  };
}
