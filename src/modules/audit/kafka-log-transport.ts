import { Logger, OnApplicationShutdown, OnModuleInit } from '@nestjs/common';
import { Producer } from 'kafkajs';
import { AuditBatch, AuditBatchLimits } from './audit-batch';
import { LogTransport } from './interfaces/log-transport.interface';

export type KafkaProducer = Pick<Producer, 'connect' | 'disconnect' | 'send'>;

/**
 * Kafka delivery for audit batches
 *
 * Each batch goes out as one produce request to a single partition with
 * `acks: -1`, so a batch is either fully written to all in-sync replicas or
 * reported as failed.
 */
export class KafkaLogTransport implements LogTransport, OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(KafkaLogTransport.name);

  constructor(
    private readonly producer: KafkaProducer,
    private readonly limits: AuditBatchLimits,
    private readonly brokers: string[],
  ) {}

  async onModuleInit(): Promise<void> {
    this.logger.log(`Starting Kafka producer for ${this.brokers.join(', ')}`);
    await this.producer.connect();
    this.logger.log('Kafka producer connected');
  }

  async onApplicationShutdown(): Promise<void> {
    await this.producer.disconnect();
    this.logger.log('Kafka producer disconnected');
  }

  createBatch(): AuditBatch {
    return new AuditBatch(this.limits);
  }

  async sendBatch(batch: AuditBatch, topic: string, partition: number): Promise<void> {
    if (!batch.isClosed) {
      throw new Error('Audit batch must be closed before it is sent');
    }

    await this.producer.send({
      topic,
      acks: -1,
      messages: batch.getRecords().map(record => ({
        partition,
        key: record.key,
        value: record.value,
        timestamp: String(record.timestamp),
      })),
    });
  }
}
