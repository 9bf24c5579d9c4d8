import { Module } from '@nestjs/common';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { DatabaseService } from './database.service';
import { Tariff } from '../modules/tariff/entities/tariff.entity';
import { CargoType } from '../modules/cargo-type/entities/cargo-type.entity';

@Module({
  imports: [
    ConfigModule,
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService): TypeOrmModuleOptions => {
        const isDevelopment = configService.get<string>('NODE_ENV') === 'development';
        const maxConnections = configService.get<number>('DB_MAX_CONNECTIONS', 10);

        return {
          type: 'postgres' as const,
          host: configService.get<string>('DB_HOST', 'localhost'),
          port: configService.get<number>('DB_PORT', 5432),
          username: configService.get<string>('DB_USERNAME', 'postgres'),
          password: configService.get<string>('DB_PASSWORD', 'postgres'),
          database: configService.get<string>('DB_DATABASE', 'insurance'),

          entities: [Tariff, CargoType],

          // Connection pool configuration for node-postgres
          poolSize: maxConnections,
          extra: {
            min: configService.get<number>('DB_MIN_CONNECTIONS', 1),
            max: maxConnections,
            idleTimeoutMillis: configService.get<number>('DB_IDLE_TIMEOUT_MS', 30000),
          },
          connectTimeoutMS: configService.get<number>('DB_CONNECT_TIMEOUT_MS', 10000),

          // Tables are created on startup unless disabled
          synchronize: configService.get<boolean>('DB_SYNCHRONIZE') ?? isDevelopment,

          logging: isDevelopment
            ? ['query', 'error', 'warn', 'info', 'log']
            : ['error', 'warn'],
          logger: 'advanced-console' as const,

          retryAttempts: 5,
          retryDelay: 3000,

          applicationName: 'insurance-cost-api',
        };
      },
      inject: [ConfigService],
    }),
  ],
  providers: [DatabaseService],
  exports: [DatabaseService, TypeOrmModule],
})
export class DatabaseModule {}
