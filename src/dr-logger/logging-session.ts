import { Logger } from '@nestjs/common';
import { Clock, systemClock, toUnixSeconds } from '../common/clock';
import { errorMessage } from '../common/errors';
import { Quantity, quantity, stripUnits } from '../common/quantity';
import { SerialLock } from '../common/serial-lock';
import {
  DatasetStore,
  NoDatasetError,
} from '../datasets/interfaces/dataset-store.interface';
import { VariableDescriptor } from '../watchers/interfaces/watcher.interface';
import { WatchedSource } from '../watchers/watched-source';
import { DatasetHandle, DatasetLifecycle } from './dataset-lifecycle';
import { IntervalScheduler, MAX_INTERVAL_SECONDS } from './interval-scheduler';

/**
 * One failure of the most recent cycle: the failing source kind, or one
 * of the store categories below, and the error message.
 */
export interface ErrorRecord {
  source: string;
  message: string;
}

/** Append still failing after recreating a lost dataset. */
export const STORE_ERROR_SOURCE = 'Dataset Store';
/** Any other failure while creating a dataset or appending. */
export const GENERAL_ERROR_SOURCE = 'General';
/** Row does not fit the current dataset's columns. */
export const SCHEMA_ERROR_SOURCE = 'Schema';

export interface CycleResult {
  written: boolean;
  /** Merged row, present once every source delivered its reading */
  row?: number[];
  errors: ErrorRecord[];
}

export type SessionState = 'idle' | 'logging' | 'shutdown';

/** Whether a source's last read succeeded. */
export interface SourceStatus {
  sourceKind: string;
  node: string;
  active: boolean;
}

export interface LoggingSessionOptions {
  /** Setup name, e.g. 'Ivan' */
  name: string;
  watchers: WatchedSource[];
  store: DatasetStore;
  datasetPath: string[];
  /** May contain the '[t]' timestamp token */
  datasetName: string;
  /** Seconds between points */
  timeInterval: number;
  clock?: Clock;
}

export class SessionShutdownError extends Error {
  constructor(public readonly sessionName: string) {
    super(`Session '${sessionName}' has been shut down`);
    this.name = 'SessionShutdownError';
  }
}

export class SchemaMismatchError extends Error {
  constructor(
    public readonly rowLength: number,
    public readonly columnCount: number,
  ) {
    super(
      `Row has ${rowLength} value(s) but the dataset declares ${columnCount} column(s)`,
    );
    this.name = 'SchemaMismatchError';
  }
}

/**
 * LoggingSession - the running logger for one cryostat setup.
 *
 * Owns the setup's watchers, its current dataset and the error list of
 * the last cycle. A cycle polls every watcher in order and writes one row
 * only if all of them delivered; otherwise the failures replace the
 * error list and nothing is written.
 *
 * States: idle <-> logging, then shutdown (terminal). Cycles run one at a
 * time whether scheduled or requested out of band, and logging
 * transitions are serialized among themselves.
 */
export class LoggingSession {
  readonly name: string;
  private readonly logger: Logger;
  private readonly watchers: readonly WatchedSource[];
  private readonly store: DatasetStore;
  private readonly clock: Clock;
  private readonly scheduler: IntervalScheduler;
  private readonly datasets: DatasetLifecycle;
  private readonly cycleLock = new SerialLock();
  private readonly transitionLock = new SerialLock();
  private state: SessionState = 'idle';
  private intervalSeconds: number;
  private errors: ErrorRecord[] = [];

  constructor(options: LoggingSessionOptions) {
    assertInterval(options.timeInterval);

    this.name = options.name;
    this.logger = new Logger(`Session:${options.name}`);
    this.watchers = [...options.watchers];
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.intervalSeconds = options.timeInterval;
    this.scheduler = new IntervalScheduler(`Scheduler:${options.name}`);
    this.datasets = new DatasetLifecycle(
      options.store,
      options.datasetPath,
      options.datasetName,
      `Datasets:${options.name}`,
    );
  }

  get status(): SessionState {
    return this.state;
  }

  get isLogging(): boolean {
    return this.state === 'logging';
  }

  /** Seconds between points. */
  get timeInterval(): number {
    return this.intervalSeconds;
  }

  /** Failures of the most recent cycle; empty after a clean one. */
  get lastErrors(): ErrorRecord[] {
    return this.errors.map((e) => ({ ...e }));
  }

  get currentDataset(): DatasetHandle | null {
    return this.datasets.current;
  }

  get sources(): SourceStatus[] {
    return this.watchers.map((w) => ({
      sourceKind: w.sourceKind,
      node: w.node,
      active: w.active,
    }));
  }

  /**
   * Run one cycle, after any cycle already in flight.
   *
   * @throws SessionShutdownError once the session is shut down
   */
  takePoint(): Promise<CycleResult> {
    return this.cycleLock.run(() =>
      this.state === 'shutdown'
        ? Promise.reject(new SessionShutdownError(this.name))
        : this.cycle(),
    );
  }

  /**
   * Start or stop the scheduled cycles. No-op if already in that state.
   *
   * @returns whether the session is logging afterwards
   */
  logging(start: boolean): Promise<boolean> {
    return this.transitionLock.run(async () => {
      if (this.state === 'shutdown') {
        if (start) {
          throw new SessionShutdownError(this.name);
        }
        return false;
      }

      if (start && this.state === 'idle') {
        this.state = 'logging';
        this.scheduler.start(this.intervalSeconds * 1000, () =>
          this.takePoint(),
        );
        this.logger.log(`Logging started, every ${this.intervalSeconds}s`);
      } else if (!start && this.state === 'logging') {
        await this.scheduler.stop();
        this.state = 'idle';
        this.logger.log('Logging stopped');
      }
      return this.isLogging;
    });
  }

  /**
   * Change the time between points. Takes effect immediately when
   * logging, otherwise on the next start.
   */
  setInterval(seconds: number): Promise<number> {
    assertInterval(seconds);
    return this.transitionLock.run(async () => {
      this.intervalSeconds = seconds;
      if (this.state === 'logging') {
        await this.scheduler.reconfigure(seconds * 1000);
      }
      this.logger.log(`Time interval set to ${seconds}s`);
      return this.intervalSeconds;
    });
  }

  /**
   * Forget the current dataset; the next successful cycle creates a new one.
   */
  newDataset(): Promise<void> {
    return this.cycleLock.run(() => {
      this.datasets.discard();
      this.logger.log('Dataset discarded, a new one starts with the next point');
      return Promise.resolve();
    });
  }

  /**
   * Stop logging, let the in-flight cycle finish and release every
   * watcher. The session cannot be restarted afterwards.
   */
  async shutdown(): Promise<void> {
    await this.transitionLock.run(async () => {
      if (this.state === 'logging') {
        await this.scheduler.stop();
      }
      this.state = 'shutdown';
    });
    await this.cycleLock.run(() => Promise.resolve());

    for (const watcher of this.watchers) {
      watcher.release();
    }
    this.logger.log('Shut down');
  }

  private async cycle(): Promise<CycleResult> {
    const now = this.clock();
    const readings: Quantity[] = [quantity(toUnixSeconds(now), 's')];
    const errors: ErrorRecord[] = [];

    for (const watcher of this.watchers) {
      try {
        readings.push(...(await watcher.takePoint()));
      } catch (error) {
        errors.push({ source: watcher.sourceKind, message: errorMessage(error) });
      }
    }

    if (errors.length > 0) {
      this.errors = errors;
      this.logger.warn(
        `Point skipped, ${errors.length} source(s) failed: ${errors.map((e) => e.source).join(', ')}`,
      );
      return { written: false, errors: this.lastErrors };
    }

    const row = stripUnits(readings);
    this.datasets.rollIfDayChanged(now);
    await this.persist(now, row, errors);

    this.errors = errors;
    return { written: errors.length === 0, row, errors: this.lastErrors };
  }

  /**
   * Write the row, creating the dataset if needed. A lost dataset is
   * recreated and the append retried once. Failures go into `errors`.
   */
  private async persist(
    now: Date,
    row: number[],
    errors: ErrorRecord[],
  ): Promise<void> {
    const schema = () => this.collectVariables();

    try {
      const handle = await this.datasets.ensure(now, schema);
      await this.append(handle, row);
      return;
    } catch (error) {
      if (!(error instanceof NoDatasetError)) {
        this.logger.error(`Error when writing data: ${errorMessage(error)}`);
        errors.push(toErrorRecord(error, GENERAL_ERROR_SOURCE));
        return;
      }
      this.logger.warn(`${error.message}, recreating dataset`);
    }

    try {
      const handle = await this.datasets.create(now, schema);
      await this.append(handle, row);
    } catch (error) {
      this.logger.error(
        `Error when writing data to recreated dataset: ${errorMessage(error)}`,
      );
      errors.push(toErrorRecord(error, STORE_ERROR_SOURCE));
    }
  }

  private async append(handle: DatasetHandle, row: number[]): Promise<void> {
    const columns = handle.independents.length + handle.dependents.length;
    if (row.length !== columns) {
      // Next cycle starts a dataset matching what the watchers report now
      this.datasets.discard();
      throw new SchemaMismatchError(row.length, columns);
    }
    await this.store.append(handle, row);
  }

  private async collectVariables(): Promise<VariableDescriptor[]> {
    const variables: VariableDescriptor[] = [];
    for (const watcher of this.watchers) {
      variables.push(...(await watcher.getVariables()));
    }
    return variables;
  }
}

function toErrorRecord(error: unknown, fallbackSource: string): ErrorRecord {
  return {
    source:
      error instanceof SchemaMismatchError
        ? SCHEMA_ERROR_SOURCE
        : fallbackSource,
    message: errorMessage(error),
  };
}

function assertInterval(seconds: number): void {
  if (
    !Number.isFinite(seconds) ||
    seconds <= 0 ||
    seconds > MAX_INTERVAL_SECONDS
  ) {
    throw new RangeError(`Invalid time interval: ${seconds}s`);
  }
}
