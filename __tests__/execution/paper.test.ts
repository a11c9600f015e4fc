import { PaperExecutionAdapter } from '../../src/execution/paper';
import { SYMBOL } from '../helpers';

describe('PaperExecutionAdapter', () => {
  it('fills at the reference price until a market price is observed', async () => {
    const paper = new PaperExecutionAdapter(50000);
    const first = await paper.buy(SYMBOL, 0.01);
    expect(first).toEqual({
      id: 'paper-buy-1',
      symbol: SYMBOL,
      side: 'buy',
      type: 'market',
      amount: 0.01,
      fillPrice: 50000,
      status: 'filled',
      simulated: true,
    });

    paper.observePrice(SYMBOL, 51234.5);
    const second = await paper.sell(SYMBOL, 0.01);
    expect(second.id).toBe('paper-sell-2');
    expect(second.fillPrice).toBe(51234.5);
    expect(await paper.currentPrice(SYMBOL)).toBe(51234.5);
  });

  it('ignores invalid observed prices', async () => {
    const paper = new PaperExecutionAdapter(50000);
    paper.observePrice(SYMBOL, 0);
    paper.observePrice(SYMBOL, Number.NaN);
    expect(await paper.currentPrice(SYMBOL)).toBe(50000);
  });

  it('accepts stop orders without filling them', async () => {
    const paper = new PaperExecutionAdapter(50000);
    const stop = await paper.placeStopLoss(SYMBOL, 0.01, 47500);
    expect(stop).toMatchObject({ id: 'paper-stop-1', side: 'sell', type: 'stop', fillPrice: 47500, status: 'accepted' });
  });
});
