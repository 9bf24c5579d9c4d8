import { INestApplication } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { QueryRunner } from 'typeorm';
import request from 'supertest';
import { configureApp } from '../../src/app.setup';
import { DatabaseService } from '../../src/database/database.service';
import { AuditService } from '../../src/modules/audit/audit.service';
import { LOG_TRANSPORT } from '../../src/modules/audit/interfaces/log-transport.interface';
import { CargoTypeService } from '../../src/modules/cargo-type/cargo-type.service';
import { HealthController } from '../../src/modules/health/health.controller';
import { TariffController } from '../../src/modules/tariff/tariff.controller';
import { TariffRepository } from '../../src/modules/tariff/tariff.repository';
import { TariffService } from '../../src/modules/tariff/tariff.service';
import { TariffUnitOfWork } from '../../src/modules/tariff/tariff-unit-of-work.service';
import {
  InMemoryLogTransport,
  InMemoryTariffRepository,
  createMockQueryRunner,
} from '../utils/test-helpers';

/**
 * HTTP scenarios against an in-process application; the store and Kafka are
 * replaced by in-memory stand-ins behind the same providers.
 */
describe('Tariff API (integration)', () => {
  let app: INestApplication;
  let repository: InMemoryTariffRepository;
  let transport: InMemoryLogTransport;
  let cargoTypes: { isRegistrationRequired: boolean; findMissing: jest.Mock };
  let isHealthy: jest.Mock;

  const config: Record<string, string | number> = {
    AUDIT_USER: 'insurance',
    KAFKA_TOPIC: 'tariff-audit',
    KAFKA_PARTITION: 0,
  };

  beforeEach(async () => {
    repository = new InMemoryTariffRepository();
    transport = new InMemoryLogTransport();
    cargoTypes = { isRegistrationRequired: false, findMissing: jest.fn().mockResolvedValue([]) };
    isHealthy = jest.fn().mockResolvedValue(true);

    const databaseService = {
      withTransaction: <T>(work: (queryRunner: QueryRunner) => Promise<T>): Promise<T> =>
        work(createMockQueryRunner().queryRunner),
      isHealthy,
    };

    const moduleRef = await Test.createTestingModule({
      controllers: [TariffController, HealthController],
      providers: [
        TariffService,
        TariffUnitOfWork,
        AuditService,
        { provide: TariffRepository, useValue: repository },
        { provide: DatabaseService, useValue: databaseService },
        { provide: LOG_TRANSPORT, useValue: transport },
        { provide: CargoTypeService, useValue: cargoTypes },
        {
          provide: ConfigService,
          useValue: { get: (key: string, defaultValue?: unknown) => config[key] ?? defaultValue },
        },
      ],
    }).compile();

    app = configureApp(moduleRef.createNestApplication({ logger: false }));
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  const electronics = { '2024-01-01': [{ cargo_type: 'electronics', rate: 1.5 }] };

  it('should load, evaluate, edit and delete a tariff', async () => {
    await request(app.getHttpServer())
      .post('/api/internal/tariffs/load')
      .send(electronics)
      .expect(200)
      .expect([{ date: '2024-01-01', cargo_type: 'electronics', rate: 1.5 }]);

    const evaluate = { insurance_date: '2024-01-01', cargo_type: 'electronics', declared_price: 200 };

    const first = await request(app.getHttpServer()).post('/api/public/evaluate_cost').send(evaluate).expect(200);
    expect(first.body).toBe(300);

    await request(app.getHttpServer())
      .post('/api/internal/tariffs/update')
      .send({ tariff_date: '2024-01-01', cargo_type: 'electronics', new_rate: 2.0 })
      .expect(200)
      .expect({ detail: 'Success' });

    const second = await request(app.getHttpServer()).post('/api/public/evaluate_cost').send(evaluate).expect(200);
    expect(second.body).toBe(400);

    await request(app.getHttpServer())
      .post('/api/internal/tariffs/delete')
      .send({ tariff_date: '2024-01-01', cargo_type: 'electronics' })
      .expect(200)
      .expect({ date: '2024-01-01', cargo_type: 'electronics', rate: 2 });

    const missing = await request(app.getHttpServer()).post('/api/public/evaluate_cost').send(evaluate).expect(404);
    expect(missing.body.message).toBe("Tariff for 'electronics' on 2024-01-01 is not found");
  });

  it('should ship one audit entry per mutation after commit', async () => {
    await request(app.getHttpServer()).post('/api/internal/tariffs/load').send(electronics).expect(200);
    await request(app.getHttpServer())
      .post('/api/internal/tariffs/update')
      .send({ tariff_date: '2024-01-01', cargo_type: 'electronics', new_rate: 2 })
      .expect(200);
    await request(app.getHttpServer())
      .post('/api/public/evaluate_cost')
      .send({ insurance_date: '2024-01-01', cargo_type: 'electronics', declared_price: 10 })
      .expect(200);
    await request(app.getHttpServer())
      .post('/api/internal/tariffs/delete')
      .send({ tariff_date: '2024-01-01', cargo_type: 'electronics' })
      .expect(200);

    expect(transport.sendCount).toBe(3);
    expect(transport.delivered.map(batch => [batch.topic, batch.partition])).toEqual([
      ['tariff-audit', 0],
      ['tariff-audit', 0],
      ['tariff-audit', 0],
    ]);
    expect(transport.entries).toEqual([
      {
        user: 'insurance',
        operation: 'upsert',
        message: '{"cargo_type":"electronics","date":"2024-01-01","rate":1.5}',
      },
      {
        user: 'insurance',
        operation: 'update',
        message: '{"cargo_type":"electronics","date":"2024-01-01","rate":2}',
      },
      {
        user: 'insurance',
        operation: 'delete',
        message: '{"cargo_type":"electronics","date":"2024-01-01","rate":2}',
      },
    ]);
  });

  it('should report nothing on a repeated load', async () => {
    await request(app.getHttpServer()).post('/api/internal/tariffs/load').send(electronics).expect(200);
    await request(app.getHttpServer())
      .post('/api/internal/tariffs/load')
      .send(electronics)
      .expect(200)
      .expect([]);

    expect(transport.entries).toHaveLength(1);
  });

  it('should answer 304 for an unchanged rate or a missing tariff', async () => {
    await request(app.getHttpServer()).post('/api/internal/tariffs/load').send(electronics).expect(200);

    await request(app.getHttpServer())
      .post('/api/internal/tariffs/update')
      .send({ tariff_date: '2024-01-01', cargo_type: 'electronics', new_rate: 1.5 })
      .expect(304);
    await request(app.getHttpServer())
      .post('/api/internal/tariffs/update')
      .send({ tariff_date: '2024-01-02', cargo_type: 'electronics', new_rate: 2 })
      .expect(304);

    expect(repository.rows.size).toBe(1);
    expect(transport.entries).toHaveLength(1);
  });

  it('should reject duplicate cargo types before touching the store', async () => {
    const upsert = jest.spyOn(repository, 'upsert');

    const response = await request(app.getHttpServer())
      .post('/api/internal/tariffs/load')
      .send({
        '2024-01-01': [
          { cargo_type: 'electronics', rate: 1.5 },
          { cargo_type: 'electronics', rate: 2 },
        ],
      })
      .expect(400);

    expect(response.body.message).toEqual([
      "At location 'body.2024-01-01' tariffs at indexes 0 and 1 share the same cargo type 'electronics'",
    ]);
    expect(upsert).not.toHaveBeenCalled();
  });

  it('should reject invalid evaluation input with per-field messages', async () => {
    const response = await request(app.getHttpServer())
      .post('/api/public/evaluate_cost')
      .send({ insurance_date: '2023-02-29', cargo_type: 'electronics', declared_price: 100 })
      .expect(400);

    expect(response.body.message).toEqual([
      "At location 'body.insurance_date' insurance_date must be a valid calendar date in YYYY-MM-DD format",
    ]);
  });

  it('should reject cargo types that are not strings', async () => {
    const upsert = jest.spyOn(repository, 'upsert');

    const load = await request(app.getHttpServer())
      .post('/api/internal/tariffs/load')
      .send({ '2024-01-01': [{ cargo_type: 42, rate: 1.5 }] })
      .expect(400);

    expect(load.body.message).toContain("At location 'body.2024-01-01.0.cargo_type' cargo_type must be a string");
    expect(upsert).not.toHaveBeenCalled();

    const evaluate = await request(app.getHttpServer())
      .post('/api/public/evaluate_cost')
      .send({ insurance_date: '2024-01-01', cargo_type: 42, declared_price: 100 })
      .expect(400);

    expect(evaluate.body.message).toContain("At location 'body.cargo_type' cargo_type must be a string");
  });

  it('should reject unknown fields', async () => {
    const response = await request(app.getHttpServer())
      .post('/api/internal/tariffs/delete')
      .send({ tariff_date: '2024-01-01', cargo_type: 'electronics', force: true })
      .expect(400);

    expect(response.body.message).toEqual(["At location 'body.force' property force should not exist"]);
  });

  it('should discard audit entries of a failed scope', async () => {
    jest.spyOn(repository, 'upsert').mockImplementationOnce(async scope => {
      scope.audit.log(scope.user, 'upsert', '{}');
      throw new Error('connection terminated');
    });

    await request(app.getHttpServer()).post('/api/internal/tariffs/load').send(electronics).expect(500);

    expect(transport.sendCount).toBe(0);
  });

  it('should answer 422 for unregistered cargo types when registration is required', async () => {
    cargoTypes.isRegistrationRequired = true;
    cargoTypes.findMissing.mockResolvedValue(['electronics']);

    const response = await request(app.getHttpServer())
      .post('/api/internal/tariffs/load')
      .send(electronics)
      .expect(422);

    expect(response.body.message).toBe("Cargo types are not registered: 'electronics'");
    expect(repository.rows.size).toBe(0);
  });

  it('should list the tariffs of a date', async () => {
    await request(app.getHttpServer())
      .post('/api/internal/tariffs/load')
      .send({
        '2024-01-01': [
          { cargo_type: 'glass', rate: 3 },
          { cargo_type: 'electronics', rate: 1.5 },
        ],
      })
      .expect(200);

    await request(app.getHttpServer())
      .get('/api/internal/tariffs/2024-01-01')
      .expect(200)
      .expect([
        { date: '2024-01-01', cargo_type: 'electronics', rate: 1.5 },
        { date: '2024-01-01', cargo_type: 'glass', rate: 3 },
      ]);

    await request(app.getHttpServer()).get('/api/internal/tariffs/2024-13-01').expect(400);
  });

  it('should report health from the database check', async () => {
    await request(app.getHttpServer()).get('/api/health').expect(200).expect({ status: 'ok', database: true });

    isHealthy.mockResolvedValue(false);
    await request(app.getHttpServer()).get('/api/health').expect(503);
  });
});
