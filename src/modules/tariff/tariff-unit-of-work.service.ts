import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../../database/database.service';
import { AuditService } from '../audit/audit.service';
import { TariffScope } from './interfaces/tariff.interface';

/**
 * TariffUnitOfWork - request scope around repository calls
 *
 * Opens an audit session and a transaction, runs the work, commits, and only
 * then ships the collected audit entries. When the work or the commit fails
 * the entries are discarded and the error propagates.
 */
@Injectable()
export class TariffUnitOfWork {
  constructor(
    private readonly databaseService: DatabaseService,
    private readonly auditService: AuditService,
  ) {}

  async run<T>(work: (scope: TariffScope) => Promise<T>): Promise<T> {
    const audit = this.auditService.openSession();

    let result: T;
    try {
      result = await this.databaseService.withTransaction(queryRunner =>
        work({ queryRunner, audit, user: this.auditService.user }),
      );
    } catch (error) {
      audit.discard();
      throw error;
    }

    await audit.flush();
    return result;
  }
}
