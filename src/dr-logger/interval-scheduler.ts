import { Logger } from '@nestjs/common';
import { errorMessage } from '../common/errors';

export class AlreadyRunningError extends Error {
  constructor() {
    super('Scheduler is already running');
    this.name = 'AlreadyRunningError';
  }
}

export type ScheduledAction = () => Promise<unknown>;

/** Longest delay a Node timer honours; larger ones fire after 1ms. */
export const MAX_INTERVAL_MS = 2 ** 31 - 1;

/** Longest accepted time between points: 24 days. */
export const MAX_INTERVAL_SECONDS = 24 * 24 * 60 * 60;

/**
 * IntervalScheduler - fires an async action at a fixed interval.
 *
 * - The first firing is immediate.
 * - Invocations never overlap: the next one is scheduled only after the
 *   current one settles, `interval` after it started (or right away if it
 *   overran). Missed ticks are not queued.
 * - stop() resolves only after the in-flight invocation settles; nothing
 *   fires after that until start() is called again. A start() issued
 *   before that settles holds its first firing until it has.
 * - A rejected action is logged and the loop carries on.
 */
export class IntervalScheduler {
  private readonly logger: Logger;
  private action: ScheduledAction | null = null;
  private intervalMs = 0;
  private running = false;
  /** Bumped on every start/stop so stale loops can tell they are stale. */
  private generation = 0;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(name = IntervalScheduler.name) {
    this.logger = new Logger(name);
  }

  get isRunning(): boolean {
    return this.running;
  }

  get interval(): number {
    return this.intervalMs;
  }

  /**
   * @throws AlreadyRunningError if the scheduler is running
   * @throws RangeError if the interval is not positive or exceeds
   *   MAX_INTERVAL_MS
   */
  start(intervalMs: number, action: ScheduledAction): void {
    if (this.running) {
      throw new AlreadyRunningError();
    }
    assertInterval(intervalMs);

    this.action = action;
    this.intervalMs = intervalMs;
    this.running = true;
    this.generation++;
    this.logger.debug(`Started with interval ${intervalMs}ms`);
    this.fire(this.generation);
  }

  async stop(): Promise<void> {
    if (this.running) {
      this.running = false;
      this.generation++;
      if (this.timer) {
        clearTimeout(this.timer);
        this.timer = null;
      }
      this.logger.debug('Stopped');
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Restart with a new interval and the same action. When stopped, only
   * records the interval for the next start().
   */
  async reconfigure(intervalMs: number): Promise<void> {
    assertInterval(intervalMs);
    if (!this.running || !this.action) {
      this.intervalMs = intervalMs;
      return;
    }

    const action = this.action;
    await this.stop();
    this.start(intervalMs, action);
  }

  private fire(generation: number): void {
    const action = this.action;
    if (!action || generation !== this.generation) {
      return;
    }

    const previous = this.inFlight;
    const run: Promise<void> = (
      previous
        ? previous.then(() => this.runOnce(action, generation))
        : this.runOnce(action, generation)
    ).then(() => {
      if (this.inFlight === run) {
        this.inFlight = null;
      }
    });
    this.inFlight = run;
  }

  private async runOnce(
    action: ScheduledAction,
    generation: number,
  ): Promise<void> {
    if (generation !== this.generation) {
      return;
    }

    const startedAt = Date.now();
    await this.invoke(action);
    if (!this.running || generation !== this.generation) {
      return;
    }
    const delay = Math.max(0, this.intervalMs - (Date.now() - startedAt));
    this.timer = setTimeout(() => {
      this.timer = null;
      this.fire(generation);
    }, delay);
  }

  private async invoke(action: ScheduledAction): Promise<void> {
    try {
      await action();
    } catch (error) {
      this.logger.error(`Scheduled action failed: ${errorMessage(error)}`);
    }
  }
}

function assertInterval(intervalMs: number): void {
  if (
    !Number.isFinite(intervalMs) ||
    intervalMs <= 0 ||
    intervalMs > MAX_INTERVAL_MS
  ) {
    throw new RangeError(`Invalid interval: ${intervalMs}ms`);
  }
}
