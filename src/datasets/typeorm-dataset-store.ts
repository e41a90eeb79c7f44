import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Dataset } from './entities/dataset.entity';
import { DatasetRow } from './entities/dataset-row.entity';
import {
  DatasetDefinition,
  DatasetStore,
  NoDatasetError,
  StoredDataset,
} from './interfaces/dataset-store.interface';

/**
 * TypeOrmDatasetStore - DatasetStore backed by PostgreSQL
 *
 * Datasets live in `datasets`, their points in `dataset_rows`. A dataset
 * that was deleted externally is reported as NoDatasetError on the next
 * append, so the logger can recreate it.
 */
@Injectable()
export class TypeOrmDatasetStore implements DatasetStore {
  private readonly logger = new Logger(TypeOrmDatasetStore.name);

  constructor(
    @InjectRepository(Dataset)
    private readonly datasetRepository: Repository<Dataset>,
    @InjectRepository(DatasetRow)
    private readonly rowRepository: Repository<DatasetRow>,
  ) {}

  async create(definition: DatasetDefinition): Promise<StoredDataset> {
    const entity = this.datasetRepository.create({
      path: definition.path,
      name: definition.name,
      independents: definition.independents,
      dependents: definition.dependents,
    });
    const saved = await this.datasetRepository.save(entity);

    this.logger.log(
      `Created dataset '${saved.name}' in ${definition.path.join('/') || '/'} ` +
        `(${saved.independents.length} independent, ${saved.dependents.length} dependent)`,
    );

    return {
      id: saved.id,
      path: saved.path,
      name: saved.name,
      independents: saved.independents,
      dependents: saved.dependents,
      createdAt: saved.createdAt,
    };
  }

  async append(dataset: StoredDataset, row: number[]): Promise<void> {
    const count = await this.datasetRepository.countBy({ id: dataset.id });
    if (count === 0) {
      throw new NoDatasetError(dataset.id);
    }

    try {
      await this.rowRepository.insert({ datasetId: dataset.id, values: row });
    } catch (error) {
      // Dataset deleted between the check and the insert: FK violation
      if (this.isForeignKeyViolation(error)) {
        throw new NoDatasetError(dataset.id);
      }
      throw error;
    }
  }

  private isForeignKeyViolation(error: unknown): boolean {
    return (
      typeof error === 'object' &&
      error !== null &&
      'code' in error &&
      error.code === '23503'
    );
  }
}
