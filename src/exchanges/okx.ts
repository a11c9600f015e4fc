import axios from 'axios';
import type { AxiosInstance } from 'axios';
import crypto from 'crypto';
import { ExchangeError } from '../errors';
import type { Candle } from '../signals/types';
import { HTTP_TIMEOUT_MS, formatPrice, formatQuantity, toNumber, venueCall } from './http';
import type { ExchangeClient, OrderSide, VenueCredentials, VenueOrder } from './types';

export const OKX_BASE = 'https://www.okx.com';

interface OkxEnvelope<T> {
  code: string;
  msg: string;
  data: T[];
}

interface OkxOrderAck {
  ordId?: string;
  algoId?: string;
  sCode: string;
  sMsg: string;
}

export function okxInstId(symbol: string): string {
  return symbol.toUpperCase().replace(/[/_]/g, '-');
}

/** OKX bars use upper-case hour/day/week units: 1m, 5m, 1H, 4H, 1D. */
export function okxBar(interval: string): string {
  return interval.replace(/([0-9]+)([hdw])$/i, (_m, n: string, unit: string) => `${n}${unit.toUpperCase()}`);
}

export function okxMarketOrderBody(symbol: string, side: OrderSide, amount: number): Record<string, string> {
  return {
    instId: okxInstId(symbol),
    tdMode: 'cash',
    side,
    ordType: 'market',
    // size in base currency for market buys too
    tgtCcy: 'base_ccy',
    sz: formatQuantity(amount),
  };
}

export function okxStopOrderBody(
  symbol: string,
  side: OrderSide,
  amount: number,
  stopPrice: number,
): Record<string, string> {
  return {
    instId: okxInstId(symbol),
    tdMode: 'cash',
    side,
    ordType: 'conditional',
    sz: formatQuantity(amount),
    slTriggerPx: formatPrice(stopPrice),
    slTriggerPxType: 'last',
    // -1 executes at market once triggered
    slOrdPx: '-1',
  };
}

export function okxSign(prehash: string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(prehash).digest('base64');
}

export class OkxClient implements ExchangeClient {
  readonly venue = 'okx' as const;
  private readonly http: AxiosInstance;
  private readonly creds: VenueCredentials | null;
  private readonly demo: boolean;

  constructor(opts: { testnet: boolean; creds: VenueCredentials | null; baseURL?: string }) {
    this.http = axios.create({ baseURL: opts.baseURL ?? OKX_BASE, timeout: HTTP_TIMEOUT_MS });
    this.creds = opts.creds;
    this.demo = opts.testnet;
  }

  createMarketOrder(symbol: string, side: OrderSide, amount: number): Promise<VenueOrder> {
    return venueCall(this.venue, `market ${side}`, async () => {
      const ack = await this.signedPost('/api/v5/trade/order', okxMarketOrderBody(symbol, side, amount));
      return { id: ack.ordId ?? '', status: 'live', filledAmount: 0, avgPrice: null };
    });
  }

  createStopOrder(symbol: string, side: OrderSide, amount: number, stopPrice: number): Promise<VenueOrder> {
    return venueCall(this.venue, 'stop-loss', async () => {
      const ack = await this.signedPost('/api/v5/trade/order-algo', okxStopOrderBody(symbol, side, amount, stopPrice));
      return { id: ack.algoId ?? '', status: 'live', filledAmount: 0, avgPrice: null };
    });
  }

  fetchTicker(symbol: string): Promise<number> {
    return venueCall(this.venue, 'ticker', async () => {
      const res = await this.http.get<OkxEnvelope<{ last: string }>>('/api/v5/market/ticker', {
        params: { instId: okxInstId(symbol) },
      });
      const row = unwrap(res.data)[0];
      if (!row) throw new Error(`No ticker for ${symbol}`);
      return toNumber(row.last, `price for ${symbol}`);
    });
  }

  fetchCandles(symbol: string, interval: string, limit: number): Promise<Candle[]> {
    return venueCall(this.venue, 'candles', async () => {
      const res = await this.http.get<OkxEnvelope<string[]>>('/api/v5/market/candles', {
        params: { instId: okxInstId(symbol), bar: okxBar(interval), limit },
      });
      // newest first on the wire
      return unwrap(res.data)
        .map((k) => ({
          openTime: toNumber(k[0], 'candle time'),
          open: toNumber(k[1], 'candle open'),
          high: toNumber(k[2], 'candle high'),
          low: toNumber(k[3], 'candle low'),
          close: toNumber(k[4], 'candle close'),
          volume: toNumber(k[5], 'candle volume'),
        }))
        .reverse();
    });
  }

  private async signedPost(path: string, body: Record<string, string>): Promise<OkxOrderAck> {
    if (!this.creds || !this.creds.passphrase) {
      throw new ExchangeError(this.venue, 'API key, secret and passphrase are required');
    }
    const json = JSON.stringify(body);
    const timestamp = new Date().toISOString();
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'OK-ACCESS-KEY': this.creds.apiKey,
      'OK-ACCESS-SIGN': okxSign(`${timestamp}POST${path}${json}`, this.creds.apiSecret),
      'OK-ACCESS-TIMESTAMP': timestamp,
      'OK-ACCESS-PASSPHRASE': this.creds.passphrase,
    };
    if (this.demo) headers['x-simulated-trading'] = '1';
    const res = await this.http.post<OkxEnvelope<OkxOrderAck>>(path, json, { headers });
    const ack = unwrap(res.data)[0];
    if (!ack || ack.sCode !== '0') {
      throw new ExchangeError(this.venue, `order rejected: ${ack?.sMsg ?? res.data.msg}`);
    }
    return ack;
  }
}

function unwrap<T>(envelope: OkxEnvelope<T>): T[] {
  if (envelope.code !== '0') throw new Error(`OKX error ${envelope.code}: ${envelope.msg}`);
  return envelope.data;
}
