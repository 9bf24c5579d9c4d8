import { AuditBatch } from '../audit-batch';

export const LOG_TRANSPORT = Symbol('LOG_TRANSPORT');

/**
 * Delivery channel for audit batches
 *
 * `createBatch` hands out an empty buffer sized for the transport;
 * `sendBatch` ships a closed batch to one topic partition as a single unit.
 */
export interface LogTransport {
  createBatch(): AuditBatch;
  sendBatch(batch: AuditBatch, topic: string, partition: number): Promise<void>;
}

export type AuditOperation = 'upsert' | 'update' | 'delete';

/**
 * Value of one audit record, encoded with `compactJson`
 */
export type AuditEntry = {
  user: string;
  operation: AuditOperation;
  message: string;
};
