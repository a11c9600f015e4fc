import { MarketDataError, errorMessage } from './errors';
import type { ExchangeClient } from './exchanges/types';
import type { MarketSnapshot } from './signals/types';

export interface MarketDataProvider {
  fetchSnapshot(symbol: string): Promise<MarketSnapshot>;
}

/** Live ticker plus recent candles from the venue's public endpoints. */
export class VenueMarketData implements MarketDataProvider {
  private readonly client: ExchangeClient;
  private readonly interval: string;
  private readonly limit: number;

  constructor(client: ExchangeClient, opts: { interval: string; limit: number }) {
    this.client = client;
    this.interval = opts.interval;
    this.limit = opts.limit;
  }

  async fetchSnapshot(symbol: string): Promise<MarketSnapshot> {
    try {
      const [price, recentSeries] = await Promise.all([
        this.client.fetchTicker(symbol),
        this.client.fetchCandles(symbol, this.interval, this.limit),
      ]);
      if (!(price > 0)) throw new Error(`non-positive price ${price}`);
      return { symbol, price, recentSeries, fetchedAt: Date.now() };
    } catch (err) {
      throw new MarketDataError(`snapshot for ${symbol} failed: ${errorMessage(err)}`, err);
    }
  }
}
