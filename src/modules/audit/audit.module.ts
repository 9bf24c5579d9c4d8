import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Kafka, KafkaConfig, SASLOptions } from 'kafkajs';
import { KafkaSaslMechanism } from '../../config/env.validation';
import { AuditService } from './audit.service';
import { kafkaLogCreator } from './kafka-log-creator';
import { KafkaLogTransport } from './kafka-log-transport';
import { LOG_TRANSPORT } from './interfaces/log-transport.interface';

export function parseBrokers(value: string): string[] {
  return value
    .split(',')
    .map(broker => broker.trim())
    .filter(broker => broker.length > 0);
}

export function buildSaslOptions(configService: ConfigService): SASLOptions | undefined {
  const mechanism = configService.get<KafkaSaslMechanism>('KAFKA_SASL_MECHANISM');
  const username = configService.get<string>('KAFKA_USERNAME', '');
  const password = configService.get<string>('KAFKA_PASSWORD', '');

  switch (mechanism) {
    case KafkaSaslMechanism.Plain:
      return { mechanism: 'plain', username, password };
    case KafkaSaslMechanism.ScramSha256:
      return { mechanism: 'scram-sha-256', username, password };
    case KafkaSaslMechanism.ScramSha512:
      return { mechanism: 'scram-sha-512', username, password };
    default:
      return undefined;
  }
}

export function createKafkaLogTransport(configService: ConfigService): KafkaLogTransport {
  const brokers = parseBrokers(configService.get<string>('KAFKA_BROKERS', 'localhost:19092'));

  const kafkaConfig: KafkaConfig = {
    clientId: configService.get<string>('KAFKA_CLIENT_ID', 'insurance-cost-api'),
    brokers,
    ssl: configService.get<boolean>('KAFKA_SSL', false),
    sasl: buildSaslOptions(configService),
    logCreator: kafkaLogCreator,
  };

  const producer = new Kafka(kafkaConfig).producer({
    allowAutoTopicCreation: true,
  });

  return new KafkaLogTransport(
    producer,
    {
      maxBytes: configService.get<number>('AUDIT_BATCH_MAX_BYTES', 16384),
      maxEntries: configService.get<number>('AUDIT_BATCH_MAX_ENTRIES', 500),
    },
    brokers,
  );
}

/**
 * AuditModule - audit trail of tariff mutations
 *
 * Entries are buffered per request and shipped to a Kafka topic after the
 * surrounding transaction commits.
 */
@Module({
  providers: [
    {
      provide: LOG_TRANSPORT,
      useFactory: createKafkaLogTransport,
      inject: [ConfigService],
    },
    AuditService,
  ],
  exports: [AuditService],
})
export class AuditModule {}
