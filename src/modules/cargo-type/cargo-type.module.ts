import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CargoType } from './entities/cargo-type.entity';
import { CargoTypeService } from './cargo-type.service';
import { CargoTypeController } from './cargo-type.controller';

@Module({
  imports: [TypeOrmModule.forFeature([CargoType])],
  controllers: [CargoTypeController],
  providers: [CargoTypeService],
  exports: [CargoTypeService],
})
export class CargoTypeModule {}
