import { Injectable, Logger } from '@nestjs/common';
import { compactJson } from '../../utils/compact-json';
import { AuditOperation } from '../audit/interfaces/log-transport.interface';
import { Tariff } from './entities/tariff.entity';
import { formatTariff, TariffRecord, TariffScope } from './interfaces/tariff.interface';

interface TariffRow {
  date: string;
  cargo_type: string;
  rate: number | string;
}

const RETURNING_TARIFF = `to_char("date", 'YYYY-MM-DD') AS "date", "cargo_type", "rate"`;

/**
 * Inserts missing tariffs and updates existing ones whose rate differs, in
 * one statement. Rows whose rate is already equal fail the WHERE clause of
 * the conflict branch and are neither touched nor returned.
 */
export const UPSERT_TARIFFS_SQL = `
  INSERT INTO "tariffs" ("date", "cargo_type", "rate")
  SELECT * FROM unnest($1::date[], $2::varchar[], $3::float8[])
  ON CONFLICT ON CONSTRAINT "unique_date_cargo_type"
  DO UPDATE SET "rate" = EXCLUDED."rate"
  WHERE "tariffs"."rate" <> EXCLUDED."rate"
  RETURNING ${RETURNING_TARIFF}`;

export const UPDATE_TARIFF_SQL = `
  UPDATE "tariffs" SET "rate" = $3
  WHERE "date" = $1 AND "cargo_type" = $2 AND "rate" <> $3
  RETURNING ${RETURNING_TARIFF}`;

export const DELETE_TARIFF_SQL = `
  DELETE FROM "tariffs"
  WHERE "date" = $1 AND "cargo_type" = $2
  RETURNING ${RETURNING_TARIFF}`;

/**
 * TariffRepository - sole reader and writer of the `tariffs` table
 *
 * Runs inside the transaction of the scope it is given and never commits it.
 * Each successful mutation appends one audit entry per affected row.
 */
@Injectable()
export class TariffRepository {
  private readonly logger = new Logger(TariffRepository.name);

  /**
   * Point lookup by date and cargo type; `null` when no tariff is configured
   */
  async fetch(scope: TariffScope, date: string, cargoType: string): Promise<TariffRecord | null> {
    const tariff = await scope.queryRunner.manager.findOne(Tariff, {
      where: { date, cargo_type: cargoType },
    });

    return tariff ? tariff.toRecord() : null;
  }

  async list(scope: TariffScope, date: string): Promise<TariffRecord[]> {
    const tariffs = await scope.queryRunner.manager.find(Tariff, {
      where: { date },
      order: { cargo_type: 'ASC' },
    });

    return tariffs.map(tariff => tariff.toRecord());
  }

  /**
   * Adds missing tariffs and changes the rate of existing ones
   *
   * Callers guarantee at most one entry per date and cargo type.
   *
   * @returns only the rows that were inserted or whose rate changed
   */
  async upsert(scope: TariffScope, tariffs: TariffRecord[]): Promise<TariffRecord[]> {
    if (tariffs.length === 0) {
      throw new Error('At least one tariff is required for an upsert');
    }

    const result = await scope.queryRunner.query(
      UPSERT_TARIFFS_SQL,
      [
        tariffs.map(tariff => tariff.date),
        tariffs.map(tariff => tariff.cargo_type),
        tariffs.map(tariff => tariff.rate),
      ],
      true,
    );

    const affected = toRecords(result.records);
    for (const tariff of affected) {
      this.logger.log(`Upserted tariff ${formatTariff(tariff)}`);
      this.audit(scope, 'upsert', tariff);
    }

    this.logger.debug(`Upsert of ${tariffs.length} tariffs affected ${affected.length} rows`);
    return affected;
  }

  /**
   * Sets a new rate on an existing tariff
   *
   * @returns the updated tariff, or `null` when the tariff does not exist or
   * already has this rate
   */
  async edit(scope: TariffScope, tariff: TariffRecord): Promise<TariffRecord | null> {
    const result = await scope.queryRunner.query(
      UPDATE_TARIFF_SQL,
      [tariff.date, tariff.cargo_type, tariff.rate],
      true,
    );

    const [updated] = toRecords(result.records);
    if (!updated) {
      return null;
    }

    this.logger.log(`Updated tariff ${formatTariff(updated)}`);
    this.audit(scope, 'update', updated);
    return updated;
  }

  /**
   * @returns the deleted tariff, or `null` when there was none
   */
  async delete(scope: TariffScope, date: string, cargoType: string): Promise<TariffRecord | null> {
    const result = await scope.queryRunner.query(DELETE_TARIFF_SQL, [date, cargoType], true);

    const [deleted] = toRecords(result.records);
    if (!deleted) {
      return null;
    }

    this.logger.log(`Deleted tariff ${formatTariff(deleted)}`);
    this.audit(scope, 'delete', deleted);
    return deleted;
  }

  private audit(scope: TariffScope, operation: AuditOperation, tariff: TariffRecord): void {
    scope.audit.log(
      scope.user,
      operation,
      compactJson({ date: tariff.date, cargo_type: tariff.cargo_type, rate: tariff.rate }),
    );
  }
}

function toRecords(rows: TariffRow[] | undefined): TariffRecord[] {
  return (rows ?? []).map(row => ({
    date: row.date,
    cargo_type: row.cargo_type,
    // float8 arrives as a number; numeric-typed drivers hand back strings
    rate: Number(row.rate),
  }));
}
