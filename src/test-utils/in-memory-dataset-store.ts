import {
  DatasetDefinition,
  DatasetStore,
  NoDatasetError,
  StoredDataset,
} from '../datasets/interfaces/dataset-store.interface';

/**
 * DatasetStore kept in memory. `lose()` simulates a dataset deleted
 * behind the logger's back; `failNextAppend()` queues one-shot failures.
 */
export class InMemoryDatasetStore implements DatasetStore {
  readonly created: StoredDataset[] = [];
  readonly appendAttempts: { datasetId: string; row: number[] }[] = [];
  private readonly rows = new Map<string, number[][]>();
  private readonly appendFailures: Error[] = [];
  private createFailure: Error | null = null;

  create(definition: DatasetDefinition): Promise<StoredDataset> {
    if (this.createFailure) {
      const error = this.createFailure;
      this.createFailure = null;
      return Promise.reject(error);
    }

    const dataset: StoredDataset = {
      ...definition,
      id: `ds-${this.created.length + 1}`,
      createdAt: new Date(),
    };
    this.created.push(dataset);
    this.rows.set(dataset.id, []);
    return Promise.resolve(dataset);
  }

  append(dataset: StoredDataset, row: number[]): Promise<void> {
    this.appendAttempts.push({ datasetId: dataset.id, row: [...row] });

    const failure = this.appendFailures.shift();
    if (failure) {
      return Promise.reject(failure);
    }

    const rows = this.rows.get(dataset.id);
    if (!rows) {
      return Promise.reject(new NoDatasetError(dataset.id));
    }
    rows.push([...row]);
    return Promise.resolve();
  }

  rowsOf(datasetId: string): number[][] {
    return this.rows.get(datasetId) ?? [];
  }

  lose(datasetId: string): void {
    this.rows.delete(datasetId);
  }

  failNextAppend(error: Error): void {
    this.appendFailures.push(error);
  }

  failNextCreate(error: Error): void {
    this.createFailure = error;
  }
}
