import { QueryRunner } from 'typeorm';
import { AuditSession } from '../../audit/audit-session';

/**
 * Wire and domain form of a tariff
 */
export interface TariffRecord {
  /** ISO calendar date, `YYYY-MM-DD` */
  date: string;
  cargo_type: string;
  rate: number;
}

/**
 * Resources of one request scope, handed to every repository call
 *
 * The repository issues statements on `queryRunner` inside the caller's
 * transaction and appends audit entries to `audit`; it never commits,
 * rolls back or flushes either of them.
 */
export interface TariffScope {
  queryRunner: QueryRunner;
  audit: AuditSession;
  /** acting identity recorded on audit entries */
  user: string;
}

export function formatTariff(tariff: TariffRecord): string {
  return `Tariff(date=${tariff.date}, cargo_type='${tariff.cargo_type}', rate=${tariff.rate})`;
}
