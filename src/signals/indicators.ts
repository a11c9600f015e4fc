export function sma(values: number[], n: number): number | null {
  if (n <= 0 || values.length < n) return null;
  const s = values.slice(-n).reduce((a, b) => a + b, 0);
  return s / n;
}

/** Exponential moving average series, seeded with the first value (no SMA warm-up). */
export function emaSeries(values: number[], span: number): number[] {
  const alpha = 2 / (span + 1);
  const out: number[] = [];
  for (const v of values) {
    const prev = out.length > 0 ? out[out.length - 1] : v;
    out.push(out.length > 0 ? alpha * v + (1 - alpha) * prev : v);
  }
  return out;
}

/**
 * Simple-average RSI over the last `period` price changes.
 * Returns 100 when there were no losses and null when the series is too short.
 */
export function rsi(values: number[], period = 14): number | null {
  if (values.length < period + 1) return null;
  const window = values.slice(-(period + 1));
  let gain = 0;
  let loss = 0;
  for (let i = 1; i < window.length; i++) {
    const delta = window[i] - window[i - 1];
    if (delta > 0) gain += delta;
    else loss -= delta;
  }
  if (loss === 0) return gain === 0 ? 50 : 100;
  const rs = gain / period / (loss / period);
  return 100 - 100 / (1 + rs);
}

export interface Macd {
  macd: number;
  signal: number;
}

export function macd(values: number[], fast = 12, slow = 26, signalSpan = 9): Macd | null {
  if (values.length < slow) return null;
  const fastEma = emaSeries(values, fast);
  const slowEma = emaSeries(values, slow);
  const line = fastEma.map((f, i) => f - slowEma[i]);
  const signalLine = emaSeries(line, signalSpan);
  return { macd: line[line.length - 1], signal: signalLine[signalLine.length - 1] };
}
