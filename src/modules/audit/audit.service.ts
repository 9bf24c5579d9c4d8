import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AuditSession } from './audit-session';
import { LOG_TRANSPORT, LogTransport } from './interfaces/log-transport.interface';

/**
 * AuditService - entry point of the audit sink
 *
 * Process-wide; hands out one AuditSession per request scope. Sessions share
 * only the transport, which owns the Kafka producer.
 */
@Injectable()
export class AuditService {
  readonly user: string;
  private readonly topic: string;
  private readonly partition: number;

  constructor(
    @Inject(LOG_TRANSPORT)
    private readonly transport: LogTransport,
    configService: ConfigService,
  ) {
    this.user =
      configService.get<string>('AUDIT_USER') ?? configService.get<string>('DB_USERNAME', 'postgres');
    this.topic = configService.get<string>('KAFKA_TOPIC', 'tariff-audit');
    this.partition = configService.get<number>('KAFKA_PARTITION', 0);
  }

  openSession(): AuditSession {
    return new AuditSession(this.transport, {
      topic: this.topic,
      partition: this.partition,
    });
  }
}
