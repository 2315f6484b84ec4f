import { DeferredTaskScheduler } from '../scheduler/deferredTasks';

describe('DeferredTaskScheduler', () => {
  let scheduler: DeferredTaskScheduler;

  beforeEach(() => {
    jest.useFakeTimers();
    scheduler = new DeferredTaskScheduler();
  });

  afterEach(() => {
    scheduler.cancelAll();
    jest.useRealTimers();
  });

  it('runs a task once its delay elapses', async () => {
    const task = jest.fn(async () => undefined);
    scheduler.schedule('settle-delay', 400, task);

    await jest.advanceTimersByTimeAsync(399);
    expect(task).not.toHaveBeenCalled();
    expect(scheduler.isPending('settle-delay')).toBe(true);

    await jest.advanceTimersByTimeAsync(1);
    expect(task).toHaveBeenCalledTimes(1);
    expect(scheduler.isPending('settle-delay')).toBe(false);
  });

  it('replaces the pending task of the same purpose', async () => {
    const first = jest.fn(async () => undefined);
    const second = jest.fn(async () => undefined);

    scheduler.schedule('settle-delay', 400, first);
    await jest.advanceTimersByTimeAsync(300);
    scheduler.schedule('settle-delay', 400, second);
    await jest.advanceTimersByTimeAsync(399);

    expect(first).not.toHaveBeenCalled();
    expect(second).not.toHaveBeenCalled();

    await jest.advanceTimersByTimeAsync(1);
    expect(second).toHaveBeenCalledTimes(1);
    expect(first).not.toHaveBeenCalled();
  });

  it('keeps tasks of different purposes apart', async () => {
    const settle = jest.fn(async () => undefined);
    const retry = jest.fn(async () => undefined);

    scheduler.schedule('settle-delay', 400, settle);
    scheduler.schedule('retry', 800, retry);
    expect(scheduler.size).toBe(2);

    await jest.advanceTimersByTimeAsync(800);
    expect(settle).toHaveBeenCalledTimes(1);
    expect(retry).toHaveBeenCalledTimes(1);
    expect(scheduler.size).toBe(0);
  });

  it('cancels by purpose', async () => {
    const task = jest.fn(async () => undefined);
    scheduler.schedule('retry', 100, task);

    expect(scheduler.cancel('retry')).toBe(true);
    expect(scheduler.cancel('retry')).toBe(false);

    await jest.advanceTimersByTimeAsync(200);
    expect(task).not.toHaveBeenCalled();
  });

  it('cancels everything at once', async () => {
    const task = jest.fn(async () => undefined);
    scheduler.schedule('retry', 100, task);
    scheduler.schedule('settle-delay', 100, task);

    scheduler.cancelAll();

    await jest.advanceTimersByTimeAsync(200);
    expect(task).not.toHaveBeenCalled();
    expect(scheduler.size).toBe(0);
  });

  it('contains a failing task', async () => {
    const failing = jest.fn(async () => {
      throw new Error('boom');
    });
    const next = jest.fn(async () => undefined);

    scheduler.schedule('retry', 10, failing);
    await jest.advanceTimersByTimeAsync(10);
    scheduler.schedule('retry', 10, next);
    await jest.advanceTimersByTimeAsync(10);

    expect(failing).toHaveBeenCalledTimes(1);
    expect(next).toHaveBeenCalledTimes(1);
  });
});
