import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DatabaseModule } from '../../database/database.module';
import { AuditModule } from '../audit/audit.module';
import { CargoTypeModule } from '../cargo-type/cargo-type.module';
import { Tariff } from './entities/tariff.entity';
import { TariffController } from './tariff.controller';
import { TariffRepository } from './tariff.repository';
import { TariffService } from './tariff.service';
import { TariffUnitOfWork } from './tariff-unit-of-work.service';

@Module({
  imports: [TypeOrmModule.forFeature([Tariff]), DatabaseModule, AuditModule, CargoTypeModule],
  controllers: [TariffController],
  providers: [TariffRepository, TariffUnitOfWork, TariffService],
  exports: [TariffService],
})
export class TariffModule {}
