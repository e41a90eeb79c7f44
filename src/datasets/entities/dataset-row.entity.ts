import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { Dataset } from './dataset.entity';

/**
 * One logged point. `values` holds the independent variables followed by
 * the dependent ones, in the dataset's declared order, units stripped.
 *
 * Rows go away with their dataset (ON DELETE CASCADE), which is how an
 * externally deleted dataset shows up to the logger as NoDatasetError.
 */
@Entity('dataset_rows')
@Index('idx_dataset_rows_dataset', ['datasetId'])
export class DatasetRow {
  /**
   * bigint comes back from pg as a string.
   */
  @PrimaryGeneratedColumn('increment', { type: 'bigint' })
  id!: string;

  @Column({ type: 'uuid' })
  datasetId!: string;

  @ManyToOne(() => Dataset, (dataset) => dataset.rows, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'datasetId' })
  dataset!: Dataset;

  @Column({ type: 'double precision', array: true })
  values!: number[];

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
