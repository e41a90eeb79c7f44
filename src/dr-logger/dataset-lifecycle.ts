import { Logger } from '@nestjs/common';
import {
  dayMarker,
  resolveDatasetName,
  TIME_VARIABLE,
} from '../datasets/dataset-naming';
import {
  DatasetStore,
  StoredDataset,
} from '../datasets/interfaces/dataset-store.interface';
import {
  formatVariable,
  VariableDescriptor,
} from '../watchers/interfaces/watcher.interface';

/**
 * The dataset a session is currently writing to, plus the day it was
 * created on.
 */
export interface DatasetHandle extends StoredDataset {
  dayMarker: string;
}

export type SchemaSource = () => Promise<VariableDescriptor[]>;

/**
 * DatasetLifecycle - decides when a session's dataset is (re)created.
 *
 * A dataset is created lazily on the first write, after a day rollover,
 * after an explicit discard, and when the store reports it lost. Dropping
 * the handle never deletes stored data.
 */
export class DatasetLifecycle {
  private readonly logger: Logger;
  private handle: DatasetHandle | null = null;

  constructor(
    private readonly store: DatasetStore,
    private readonly path: string[],
    private readonly nameTemplate: string,
    loggerContext: string,
  ) {
    this.logger = new Logger(loggerContext);
  }

  get current(): DatasetHandle | null {
    return this.handle;
  }

  discard(): void {
    this.handle = null;
  }

  /**
   * Drop the handle if `now` falls on another calendar day than its
   * creation.
   *
   * @returns true if a handle was dropped
   */
  rollIfDayChanged(now: Date): boolean {
    if (!this.handle || this.handle.dayMarker === dayMarker(now)) {
      return false;
    }
    this.logger.log(
      `Day rolled over (${this.handle.dayMarker} -> ${dayMarker(now)}), starting a new dataset`,
    );
    this.handle = null;
    return true;
  }

  async ensure(now: Date, schema: SchemaSource): Promise<DatasetHandle> {
    return this.handle ?? this.create(now, schema);
  }

  /**
   * Create a dataset whose dependents are the current schema, and make
   * it current. The previous handle is dropped first, so a failure here
   * leaves no handle behind.
   */
  async create(now: Date, schema: SchemaSource): Promise<DatasetHandle> {
    this.handle = null;

    const name = resolveDatasetName(this.nameTemplate, now);
    const dependents = (await schema()).map(formatVariable);
    this.logger.log(
      `Making new dataset '${name}': ${dependents.length} dependent variable(s)`,
    );
    this.logger.debug(`Dependent vars: ${dependents.join(', ')}`);

    const stored = await this.store.create({
      path: this.path,
      name,
      independents: [TIME_VARIABLE],
      dependents,
    });
    this.handle = { ...stored, dayMarker: dayMarker(now) };
    return this.handle;
  }
}
