/**
 * Dataset store contract.
 *
 * A dataset is an append-only table addressed by path + name, whose
 * columns (independent then dependent variables) are declared once at
 * creation. Rows are plain numbers, one per declared variable.
 */

/** Injection token for the active {@link DatasetStore}. */
export const DATASET_STORE = Symbol('DATASET_STORE');

export interface DatasetDefinition {
  /** Directory-like location, e.g. ['', 'DR', 'Ivan'] */
  path: string[];
  name: string;
  /** Rendered "label [unit]" / "label (category) [unit]" strings */
  independents: string[];
  dependents: string[];
}

export interface StoredDataset extends DatasetDefinition {
  id: string;
  createdAt: Date;
}

export interface DatasetStore {
  create(definition: DatasetDefinition): Promise<StoredDataset>;

  /**
   * Append one row to a dataset.
   * @throws NoDatasetError if the store no longer holds the dataset
   */
  append(dataset: StoredDataset, row: number[]): Promise<void>;
}

/**
 * The store has no dataset under this id, typically because it was
 * deleted behind the logger's back.
 */
export class NoDatasetError extends Error {
  constructor(public readonly datasetId: string) {
    super(`NoDatasetError: dataset ${datasetId} does not exist`);
    this.name = 'NoDatasetError';
  }
}
