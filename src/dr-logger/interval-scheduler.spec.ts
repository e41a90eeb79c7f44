import {
  AlreadyRunningError,
  IntervalScheduler,
  MAX_INTERVAL_MS,
} from './interval-scheduler';

describe('IntervalScheduler', () => {
  let scheduler: IntervalScheduler;

  /** Let pending promise callbacks run without moving the clock. */
  const settle = () => jest.advanceTimersByTimeAsync(0);

  const sleep = (ms: number) =>
    new Promise<void>((resolve) => setTimeout(resolve, ms));

  beforeEach(() => {
    jest.useFakeTimers();
    scheduler = new IntervalScheduler();
  });

  afterEach(async () => {
    const stopping = scheduler.stop();
    await jest.runOnlyPendingTimersAsync();
    await stopping;
    jest.useRealTimers();
  });

  it('should fire immediately on start', () => {
    const action = jest.fn().mockResolvedValue(undefined);

    scheduler.start(1000, action);

    expect(action).toHaveBeenCalledTimes(1);
    expect(scheduler.isRunning).toBe(true);
  });

  it('should fire again after each interval', async () => {
    const action = jest.fn().mockResolvedValue(undefined);

    scheduler.start(1000, action);
    await settle();
    await jest.advanceTimersByTimeAsync(999);
    expect(action).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(1);
    expect(action).toHaveBeenCalledTimes(2);
  });

  it('should never overlap invocations of a slow action', async () => {
    let running = 0;
    let maxRunning = 0;
    const action = jest.fn(async () => {
      running++;
      maxRunning = Math.max(maxRunning, running);
      await sleep(2500);
      running--;
    });

    scheduler.start(1000, action);
    await jest.advanceTimersByTimeAsync(1000);
    expect(action).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(3000);
    expect(action).toHaveBeenCalledTimes(2);
    expect(maxRunning).toBe(1);
  });

  it('should throw AlreadyRunningError when started twice', () => {
    const action = jest.fn().mockResolvedValue(undefined);
    scheduler.start(1000, action);

    expect(() => scheduler.start(1000, action)).toThrow(AlreadyRunningError);
    expect(action).toHaveBeenCalledTimes(1);
  });

  it('should reject a non-positive interval', () => {
    expect(() => scheduler.start(0, jest.fn())).toThrow(RangeError);
    expect(scheduler.isRunning).toBe(false);
  });

  it('should reject an interval longer than a timer can wait', () => {
    const action = jest.fn().mockResolvedValue(undefined);

    expect(() => scheduler.start(MAX_INTERVAL_MS + 1, action)).toThrow(
      RangeError,
    );
    expect(action).not.toHaveBeenCalled();
  });

  it('should wait the longest interval a timer can hold', async () => {
    const action = jest.fn().mockResolvedValue(undefined);

    scheduler.start(MAX_INTERVAL_MS, action);
    await jest.advanceTimersByTimeAsync(200);

    expect(action).toHaveBeenCalledTimes(1);
  });

  describe('stop', () => {
    it('should wait for the in-flight action before resolving', async () => {
      let finish: () => void = () => undefined;
      const action = jest.fn(
        () =>
          new Promise<void>((resolve) => {
            finish = resolve;
          }),
      );
      scheduler.start(1000, action);

      let stopped = false;
      const stopping = scheduler.stop().then(() => {
        stopped = true;
      });
      await settle();
      expect(stopped).toBe(false);

      finish();
      await stopping;
      expect(stopped).toBe(true);
    });

    it('should not fire after stop resolves', async () => {
      const action = jest.fn().mockResolvedValue(undefined);
      scheduler.start(1000, action);
      await settle();

      await scheduler.stop();
      await jest.advanceTimersByTimeAsync(10000);

      expect(action).toHaveBeenCalledTimes(1);
      expect(scheduler.isRunning).toBe(false);
    });

    it('should hold a restart until the unawaited stop has drained', async () => {
      let running = 0;
      let maxRunning = 0;
      const action = jest.fn(async () => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await sleep(500);
        running--;
      });

      scheduler.start(1000, action);
      const firstStop = scheduler.stop();
      scheduler.start(1000, action);
      expect(action).toHaveBeenCalledTimes(1);

      await jest.advanceTimersByTimeAsync(500);
      expect(action).toHaveBeenCalledTimes(2);

      const secondStop = scheduler.stop();
      await jest.advanceTimersByTimeAsync(500);
      await Promise.all([firstStop, secondStop]);

      expect(maxRunning).toBe(1);
      expect(running).toBe(0);
    });

    it('should be a no-op when not running', async () => {
      await expect(scheduler.stop()).resolves.toBeUndefined();
    });
  });

  describe('reconfigure', () => {
    it('should restart immediately with the new interval', async () => {
      const action = jest.fn().mockResolvedValue(undefined);
      scheduler.start(1000, action);
      await settle();

      await scheduler.reconfigure(5000);
      expect(action).toHaveBeenCalledTimes(2);
      expect(scheduler.interval).toBe(5000);

      await settle();
      await jest.advanceTimersByTimeAsync(4999);
      expect(action).toHaveBeenCalledTimes(2);
      await jest.advanceTimersByTimeAsync(1);
      expect(action).toHaveBeenCalledTimes(3);
    });

    it('should only record the interval when stopped', async () => {
      await scheduler.reconfigure(2000);

      expect(scheduler.interval).toBe(2000);
      expect(scheduler.isRunning).toBe(false);
    });
  });

  it('should keep firing after the action rejects', async () => {
    const action = jest
      .fn()
      .mockRejectedValueOnce(new Error('instrument offline'))
      .mockResolvedValue(undefined);

    scheduler.start(1000, action);
    await settle();
    await jest.advanceTimersByTimeAsync(1000);

    expect(action).toHaveBeenCalledTimes(2);
  });
});
