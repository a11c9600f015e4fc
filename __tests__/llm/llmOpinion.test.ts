import { InvalidSignalError } from '../../src/errors';
import { createMockAdapter } from '../../src/llm/mock';
import { parseOpinion } from '../../src/llm/openai';
import type { LLMAdapter, LLMOpinion } from '../../src/llm/types';
import { createLLMOpinionSource } from '../../src/signals/llmOpinion';
import { SYMBOL, candlesFrom, snapshotAt } from '../helpers';

describe('parseOpinion', () => {
  it('accepts a well-formed reply', () => {
    expect(parseOpinion('{"direction":"SELL","confidence":72,"rationale":"lower highs"}')).toEqual({
      direction: 'SELL',
      confidence: 72,
      rationale: 'lower highs',
    });
  });

  it('rejects non-JSON and malformed replies', () => {
    expect(() => parseOpinion('I think BUY')).toThrow(InvalidSignalError);
    expect(() => parseOpinion('{"direction":"LONG","confidence":50,"rationale":"x"}')).toThrow(InvalidSignalError);
    expect(() => parseOpinion('{"direction":"BUY","confidence":150,"rationale":"x"}')).toThrow(InvalidSignalError);
  });
});

describe('mock LLM adapter', () => {
  const mock = createMockAdapter('mock');

  it('compares the price with the start of the window', async () => {
    const recentSeries = candlesFrom([100, 104]);
    expect((await mock.opine({ symbol: SYMBOL, price: 105, recentSeries })).direction).toBe('BUY');
    expect((await mock.opine({ symbol: SYMBOL, price: 95, recentSeries })).direction).toBe('SELL');
    expect(await mock.opine({ symbol: SYMBOL, price: 105, recentSeries: [] })).toEqual({
      direction: 'HOLD',
      confidence: 0,
      rationale: 'mock: no data',
    });
  });
});

describe('llm-opinion source', () => {
  function scriptedLLM(opinion: LLMOpinion): LLMAdapter & { opine: jest.Mock } {
    return { id: 'analyst', opine: jest.fn().mockResolvedValue(opinion) };
  }

  it('prefixes the rationale with the adapter id', async () => {
    const llm = scriptedLLM({ direction: 'BUY', confidence: 65, rationale: 'breakout' });
    const source = createLLMOpinionSource('llm-opinion', llm);
    expect(await source.evaluate(snapshotAt(100))).toEqual({
      direction: 'BUY',
      confidence: 65,
      rationale: 'analyst: breakout',
    });
  });

  it('replays the last opinion inside the call interval', async () => {
    let now = 0;
    const llm = scriptedLLM({ direction: 'SELL', confidence: 70, rationale: 'fading' });
    const source = createLLMOpinionSource('llm-opinion', llm, 5000, () => now);

    await source.evaluate(snapshotAt(100));
    now = 1000;
    const replay = await source.evaluate(snapshotAt(100));
    expect(llm.opine).toHaveBeenCalledTimes(1);
    expect(replay.rationale).toBe('analyst: fading');

    now = 6000;
    await source.evaluate(snapshotAt(100));
    expect(llm.opine).toHaveBeenCalledTimes(2);
  });

  it('rejects out-of-range confidence from the adapter', async () => {
    const llm = scriptedLLM({ direction: 'BUY', confidence: 140, rationale: 'sure thing' });
    await expect(createLLMOpinionSource('llm-opinion', llm).evaluate(snapshotAt(100))).rejects.toThrow(
      InvalidSignalError,
    );
  });
});
