import { Logger } from '@nestjs/common';
import { compactJsonBytes } from '../../utils/compact-json';
import { AuditBatch } from './audit-batch';
import { AuditEntry, AuditOperation, LogTransport } from './interfaces/log-transport.interface';

export interface AuditDestination {
  topic: string;
  partition: number;
}

type SessionState = 'open' | 'flushed' | 'discarded';

/**
 * Audit entries collected during one request scope
 *
 * `log` only buffers. Batches that fill up are sealed and parked until
 * `flush`, which the unit of work calls once the transaction has committed;
 * a rolled back scope calls `discard` instead, so nothing is ever shipped
 * for a mutation that did not persist.
 */
export class AuditSession {
  private readonly logger = new Logger(AuditSession.name);
  private readonly sealed: AuditBatch[] = [];
  private batch: AuditBatch;
  private state: SessionState = 'open';

  constructor(
    private readonly transport: LogTransport,
    private readonly destination: AuditDestination,
  ) {
    this.batch = transport.createBatch();
  }

  log(user: string, operation: AuditOperation, message: string): void {
    if (this.state !== 'open') {
      throw new Error(`Audit session is already ${this.state}`);
    }

    const entry: AuditEntry = { user, operation, message };
    const value = compactJsonBytes(entry);

    if (this.batch.append(null, null, value) === null) {
      this.batch.close();
      this.sealed.push(this.batch);
      this.batch = this.transport.createBatch();
      this.batch.append(null, null, value);
    }
  }

  /**
   * Ships every buffered batch in order. Delivery failures are logged and
   * swallowed; audit logging never fails the request.
   */
  async flush(): Promise<void> {
    if (this.state !== 'open') {
      return;
    }
    this.state = 'flushed';
    this.batch.close();

    const batches = [...this.sealed, this.batch].filter(batch => !batch.isEmpty);
    this.sealed.length = 0;

    const { topic, partition } = this.destination;
    for (const batch of batches) {
      try {
        await this.transport.sendBatch(batch, topic, partition);
        this.logger.debug(
          `Delivered ${batch.size} audit entries (${batch.sizeInBytes} bytes) to ${topic}[${partition}]`,
        );
      } catch (error) {
        const err = error as Error;
        this.logger.error(
          `Failed to deliver ${batch.size} audit entries to ${topic}[${partition}]: ${err.message}`,
          err.stack,
        );
      }
    }
  }

  discard(): void {
    if (this.state !== 'open') {
      return;
    }
    const dropped = this.pendingEntries;
    this.state = 'discarded';
    this.batch.close();
    this.sealed.length = 0;

    if (dropped > 0) {
      this.logger.warn(`Discarded ${dropped} audit entries of a rolled back scope`);
    }
  }

  get pendingEntries(): number {
    if (this.state !== 'open') {
      return 0;
    }
    return this.sealed.reduce((total, batch) => total + batch.size, this.batch.size);
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }
}
