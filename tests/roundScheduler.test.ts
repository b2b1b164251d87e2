import { RoundScheduler } from '../src/scheduler/roundScheduler';
import { captureLogger, useFakeClock } from './helpers';

describe('RoundScheduler', () => {
  const clock = () => Date.now();
  let scheduler: RoundScheduler | null = null;

  beforeEach(() => useFakeClock());
  afterEach(() => {
    scheduler?.stop();
    scheduler = null;
    jest.useRealTimers();
  });

  it('runs the first round right away and then once per interval', async () => {
    const task = jest.fn(async () => undefined);
    scheduler = new RoundScheduler(task, { intervalMs: 1000, clock, logger: captureLogger() });

    scheduler.start();
    expect(task).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(999);
    expect(task).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(1);
    expect(task).toHaveBeenCalledTimes(2);
    expect(scheduler.roundCount).toBe(2);
  });

  it('never overlaps rounds that overrun the interval', async () => {
    let active = 0;
    let maxActive = 0;
    const task = jest.fn(async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise<void>((resolve) => setTimeout(resolve, 1500));
      active--;
    });
    scheduler = new RoundScheduler(task, { intervalMs: 1000, clock, logger: captureLogger() });

    scheduler.start();
    await jest.advanceTimersByTimeAsync(1000);
    expect(task).toHaveBeenCalledTimes(1);

    // an overrun round is followed by a zero-delay tick, which fires 1ms later
    await jest.advanceTimersByTimeAsync(501);
    expect(task).toHaveBeenCalledTimes(2);

    await jest.advanceTimersByTimeAsync(1500);
    expect(task).toHaveBeenCalledTimes(2);

    await jest.advanceTimersByTimeAsync(1);
    expect(task).toHaveBeenCalledTimes(3);
    expect(maxActive).toBe(1);
  });

  it('keeps the cadence when a round takes part of the interval', async () => {
    const task = jest.fn(() => new Promise<void>((resolve) => setTimeout(resolve, 300)));
    scheduler = new RoundScheduler(task, { intervalMs: 1000, clock, logger: captureLogger() });

    scheduler.start();
    await jest.advanceTimersByTimeAsync(999);
    expect(task).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(1);
    expect(task).toHaveBeenCalledTimes(2);
  });

  it('logs a failed round and keeps scheduling', async () => {
    const logger = captureLogger();
    const task = jest.fn(async () => undefined);
    task.mockRejectedValueOnce(new Error('boom'));
    scheduler = new RoundScheduler(task, { intervalMs: 1000, clock, logger });

    scheduler.start();
    await jest.advanceTimersByTimeAsync(0);
    expect(logger.entries.filter((e) => e.level === 'error')).toEqual([
      { level: 'error', message: 'Measurement round failed', meta: { round: 1, error: 'Error: boom' } },
    ]);

    await jest.advanceTimersByTimeAsync(1000);
    expect(task).toHaveBeenCalledTimes(2);
  });

  it('stop aborts the running round and cancels the next tick', async () => {
    const signals: AbortSignal[] = [];
    const task = jest.fn(async (signal: AbortSignal) => {
      signals.push(signal);
    });
    scheduler = new RoundScheduler(task, { intervalMs: 1000, clock, logger: captureLogger() });

    scheduler.start();
    await jest.advanceTimersByTimeAsync(0);
    expect(jest.getTimerCount()).toBe(1);

    scheduler.stop();
    scheduler.stop();
    expect(scheduler.stopped).toBe(true);
    expect(signals[0].aborted).toBe(true);
    expect(jest.getTimerCount()).toBe(0);

    scheduler.start();
    await jest.advanceTimersByTimeAsync(5000);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('does not arm a timer when stopped during a round', async () => {
    const task = jest.fn(() => new Promise<void>((resolve) => setTimeout(resolve, 200)));
    scheduler = new RoundScheduler(task, { intervalMs: 1000, clock, logger: captureLogger() });

    scheduler.start();
    const idle = scheduler.idle();
    scheduler.stop();

    await jest.advanceTimersByTimeAsync(200);
    await idle;
    expect(jest.getTimerCount()).toBe(0);

    await jest.advanceTimersByTimeAsync(5000);
    expect(task).toHaveBeenCalledTimes(1);
  });
});
