import { Column, Entity, PrimaryColumn } from 'typeorm';
import { TariffRecord } from '../interfaces/tariff.interface';

/**
 * Tariff entity - rate multiplier for one cargo type on one calendar date
 *
 * The composite primary key doubles as the conflict target of the load upsert,
 * hence the explicit constraint name.
 */
@Entity('tariffs')
export class Tariff {
  @PrimaryColumn({ type: 'date', primaryKeyConstraintName: 'unique_date_cargo_type' })
  date!: string;

  @PrimaryColumn({ type: 'varchar', length: 50, primaryKeyConstraintName: 'unique_date_cargo_type' })
  cargo_type!: string;

  @Column({ type: 'double precision' })
  rate!: number;

  toRecord(): TariffRecord {
    return {
      date: this.date,
      cargo_type: this.cargo_type,
      rate: Number(this.rate),
    };
  }
}
