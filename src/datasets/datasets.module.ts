import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Dataset } from './entities/dataset.entity';
import { DatasetRow } from './entities/dataset-row.entity';
import { DATASET_STORE } from './interfaces/dataset-store.interface';
import { TypeOrmDatasetStore } from './typeorm-dataset-store';

/**
 * DatasetsModule
 *
 * Provides the dataset store behind the DATASET_STORE token.
 */
@Module({
  imports: [TypeOrmModule.forFeature([Dataset, DatasetRow])],
  providers: [
    TypeOrmDatasetStore,
    {
      provide: DATASET_STORE,
      useExisting: TypeOrmDatasetStore,
    },
  ],
  exports: [DATASET_STORE],
})
export class DatasetsModule {}
