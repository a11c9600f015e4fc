import { sleep } from '../../src/engine/scheduler';

describe('sleep', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('resolves after the delay', async () => {
    jest.useFakeTimers();
    const done = jest.fn();
    const pending = sleep(1000).then(done);
    await jest.advanceTimersByTimeAsync(999);
    expect(done).not.toHaveBeenCalled();
    await jest.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toHaveBeenCalledTimes(1);
  });

  it('wakes immediately on abort', async () => {
    jest.useFakeTimers();
    const controller = new AbortController();
    const pending = sleep(300000, controller.signal);
    controller.abort();
    await expect(pending).resolves.toBeUndefined();
    expect(jest.getTimerCount()).toBe(0);
  });

  it('returns at once when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(300000, controller.signal)).resolves.toBeUndefined();
  });
});
