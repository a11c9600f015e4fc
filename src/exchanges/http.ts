import axios from 'axios';
import { ExchangeError } from '../errors';

export const HTTP_TIMEOUT_MS = 8000;

export function describeHttpError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const body = err.response?.data === undefined ? '' : ` ${JSON.stringify(err.response.data)}`;
    return status ? `HTTP ${status}${body}` : err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

/** Runs one venue call, surfacing any failure as an ExchangeError. */
export async function venueCall<T>(venue: string, what: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof ExchangeError) throw err;
    throw new ExchangeError(venue, `${what} failed: ${describeHttpError(err)}`, err);
  }
}

export function toNumber(value: unknown, what: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) throw new Error(`Invalid ${what}: ${String(value)}`);
  return n;
}

/** 8 decimal places, trailing zeros trimmed. */
export function formatQuantity(quantity: number): string {
  return quantity.toFixed(8).replace(/\.?0+$/, '');
}

export function formatPrice(price: number): string {
  return price.toFixed(2);
}
