import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { DatasetRow } from './dataset-row.entity';

/**
 * Dataset Entity
 *
 * One append-only table of logged points. The column schema (independent
 * and dependent variable labels) is fixed when the dataset is created;
 * every DatasetRow carries exactly independents + dependents values.
 *
 * Datasets are addressed by path + name. Names are not unique: a logger
 * that recreates its dataset within the same minute produces two datasets
 * with the same name, told apart by id and createdAt.
 */
@Entity('datasets')
@Index('idx_datasets_path_name', ['path', 'name'])
export class Dataset {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  /**
   * Directory-like location, e.g. {'', 'DR', 'Ivan'}.
   */
  @Column({ type: 'text', array: true })
  path!: string[];

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  /**
   * Independent variable labels, e.g. {'time [s]'}.
   */
  @Column({ type: 'text', array: true })
  independents!: string[];

  /**
   * Dependent variable labels, "label (category) [unit]".
   */
  @Column({ type: 'text', array: true })
  dependents!: string[];

  @OneToMany(() => DatasetRow, (row) => row.dataset)
  rows!: DatasetRow[];

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
