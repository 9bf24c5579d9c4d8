import { HttpException, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, QueryRunner } from 'typeorm';

export interface ConnectionInfo {
  isConnected: boolean;
  uri: string;
}

/**
 * Database service owning connection scopes
 *
 * Every request borrows one pooled connection through `withTransaction`
 * and hands it back on every exit path.
 */
@Injectable()
export class DatabaseService implements OnModuleInit {
  private readonly logger = new Logger(DatabaseService.name);

  constructor(
    @InjectDataSource()
    private readonly dataSource: DataSource,
  ) {}

  async onModuleInit(): Promise<void> {
    const info = this.getConnectionInfo();
    this.logger.log(`Verifying connectivity to the database ${info.uri}`);

    if (await this.isHealthy()) {
      this.logger.log('Connection to the database can be established successfully');
    }
  }

  /**
   * Run `work` inside a transaction on a dedicated connection
   *
   * Commits when `work` resolves, rolls back when it throws, and always
   * releases the connection. Errors propagate unchanged.
   */
  async withTransaction<T>(work: (queryRunner: QueryRunner) => Promise<T>): Promise<T> {
    const queryRunner = this.dataSource.createQueryRunner();

    try {
      await queryRunner.connect();
      await queryRunner.startTransaction();

      const result = await work(queryRunner);

      await queryRunner.commitTransaction();
      return result;
    } catch (error) {
      await this.rollbackQuietly(queryRunner);

      if (error instanceof HttpException) {
        this.logger.debug(`Transaction rolled back: ${error.message}`);
      } else {
        const err = error as Error;
        this.logger.error(`Transaction failed: ${err.message}`, err.stack);
      }
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  /**
   * Check if database connection is healthy
   */
  async isHealthy(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch (error) {
      const err = error as Error;
      this.logger.error(`Database health check failed: ${err.message}`);
      return false;
    }
  }

  /**
   * Connection info for logs and health output, password redacted
   */
  getConnectionInfo(): ConnectionInfo {
    const options = this.dataSource.options;
    if (options.type !== 'postgres') {
      return { isConnected: this.dataSource.isInitialized, uri: options.type };
    }

    const user = options.username ?? '';
    const credentials = user ? `${user}:***@` : '';
    const uri = `postgresql://${credentials}${options.host ?? 'localhost'}:${options.port ?? 5432}/${options.database ?? ''}`;

    return { isConnected: this.dataSource.isInitialized, uri };
  }

  private async rollbackQuietly(queryRunner: QueryRunner): Promise<void> {
    if (!queryRunner.isTransactionActive) {
      return;
    }

    try {
      await queryRunner.rollbackTransaction();
    } catch (rollbackError) {
      this.logger.error('Failed to roll back transaction', (rollbackError as Error).stack);
    }
  }
}
