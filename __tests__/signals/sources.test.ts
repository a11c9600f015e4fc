import { createMeanReversionSource } from '../../src/signals/meanReversion';
import { createMomentumSource } from '../../src/signals/momentum';
import { createTechnicalIndicatorsSource } from '../../src/signals/technicalIndicators';
import { snapshotAt } from '../helpers';

const rising = Array.from({ length: 60 }, (_, i) => i + 1);
const falling = [...rising].reverse();

describe('technical-indicators source', () => {
  const source = createTechnicalIndicatorsSource();

  it('holds without enough history', async () => {
    expect(await source.evaluate(snapshotAt(100, rising.slice(0, 49)))).toEqual({
      direction: 'HOLD',
      confidence: 0,
      rationale: 'Insufficient data for technical analysis',
    });
  });

  it('sums the votes of a rising market', async () => {
    expect(await source.evaluate(snapshotAt(60, rising))).toEqual({
      direction: 'BUY',
      confidence: 45,
      rationale: 'RSI overbought at 100.0; MA bullish crossover; MACD bullish',
    });
  });

  it('sums the votes of a falling market', async () => {
    expect(await source.evaluate(snapshotAt(1, falling))).toEqual({
      direction: 'SELL',
      confidence: 45,
      rationale: 'RSI oversold at 0.0; MA bearish crossover; MACD bearish',
    });
  });

  it('holds at 50 on a flat market', async () => {
    expect(await source.evaluate(snapshotAt(100, Array<number>(60).fill(100)))).toEqual({
      direction: 'HOLD',
      confidence: 50,
      rationale: 'No clear technical signals',
    });
  });
});

describe('momentum source', () => {
  const source = createMomentumSource();

  it('follows the last three closes', async () => {
    expect(await source.evaluate(snapshotAt(103, [90, 100, 101, 103]))).toEqual({
      direction: 'BUY',
      confidence: 60,
      rationale: 'upward momentum +3.00 over 3 bars',
    });
    expect((await source.evaluate(snapshotAt(100, [103, 101, 100]))).rationale).toBe(
      'downward momentum -3.00 over 3 bars',
    );
  });

  it('holds when flat or short', async () => {
    expect((await source.evaluate(snapshotAt(100, [100, 105, 100]))).rationale).toBe('flat momentum');
    expect((await source.evaluate(snapshotAt(100, [100, 101]))).rationale).toBe('not enough bars for momentum');
  });
});

describe('mean-reversion source', () => {
  const source = createMeanReversionSource();
  const flat = Array<number>(10).fill(100);

  it('buys below the average and sells above it', async () => {
    expect(await source.evaluate(snapshotAt(99, flat))).toEqual({
      direction: 'BUY',
      confidence: 60,
      rationale: 'price -1.00% below SMA10',
    });
    expect((await source.evaluate(snapshotAt(101, flat))).direction).toBe('SELL');
  });

  it('holds inside the band', async () => {
    expect((await source.evaluate(snapshotAt(100.1, flat))).rationale).toBe('price within 0.30% of SMA10');
    expect((await source.evaluate(snapshotAt(100, [100]))).rationale).toBe('fewer than 10 bars for mean reversion');
  });
});
