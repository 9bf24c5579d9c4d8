import {
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { CargoTypeService } from '../cargo-type/cargo-type.service';
import { EditTariffDto } from './dto/edit-tariff.dto';
import { EvaluateCostDto } from './dto/evaluate-cost.dto';
import { TariffKeyDto } from './dto/tariff-key.dto';
import { TariffRecord, TariffScope } from './interfaces/tariff.interface';
import { TariffRepository } from './tariff.repository';
import { TariffUnitOfWork } from './tariff-unit-of-work.service';

export function tariffNotFoundMessage(cargoType: string, date: string): string {
  return `Tariff for '${cargoType}' on ${date} is not found`;
}

/**
 * TariffService - cost evaluation and tariff maintenance
 *
 * Each call runs in its own unit of work; outcomes the repository reports as
 * `null` are mapped to HTTP errors once the transaction has ended.
 */
@Injectable()
export class TariffService {
  private readonly logger = new Logger(TariffService.name);

  constructor(
    private readonly unitOfWork: TariffUnitOfWork,
    private readonly tariffRepository: TariffRepository,
    private readonly cargoTypeService: CargoTypeService,
  ) {}

  /**
   * Insurance cost of a shipment: tariff rate times declared price
   *
   * @throws NotFoundException when no tariff exists for the date and cargo type
   */
  async evaluateCost(evaluateDto: EvaluateCostDto): Promise<number> {
    const { insurance_date: date, cargo_type: cargoType, declared_price: declaredPrice } = evaluateDto;

    const tariff = await this.unitOfWork.run(async scope => {
      if (await this.hasUnregistered(scope, [cargoType])) {
        return null;
      }
      return this.tariffRepository.fetch(scope, date, cargoType);
    });

    if (!tariff) {
      throw new NotFoundException(tariffNotFoundMessage(cargoType, date));
    }

    const cost = tariff.rate * declaredPrice;
    this.logger.debug(`Evaluated cost ${cost} for '${cargoType}' on ${date}`);
    return cost;
  }

  /**
   * @returns the tariffs that were inserted or whose rate changed
   */
  async loadTariffs(tariffs: TariffRecord[]): Promise<TariffRecord[]> {
    return this.unitOfWork.run(async scope => {
      await this.ensureRegistered(scope, tariffs.map(tariff => tariff.cargo_type));
      return this.tariffRepository.upsert(scope, tariffs);
    });
  }

  /**
   * @throws HttpException 304 when the tariff is missing or already has the rate
   */
  async editTariff(editDto: EditTariffDto): Promise<TariffRecord> {
    const updated = await this.unitOfWork.run(async scope => {
      await this.ensureRegistered(scope, [editDto.cargo_type]);
      return this.tariffRepository.edit(scope, {
        date: editDto.tariff_date,
        cargo_type: editDto.cargo_type,
        rate: editDto.new_rate,
      });
    });

    if (!updated) {
      throw new HttpException('Tariff unchanged or not found', HttpStatus.NOT_MODIFIED);
    }
    return updated;
  }

  async deleteTariff(keyDto: TariffKeyDto): Promise<TariffRecord> {
    const deleted = await this.unitOfWork.run(scope =>
      this.tariffRepository.delete(scope, keyDto.tariff_date, keyDto.cargo_type),
    );

    if (!deleted) {
      throw new NotFoundException(tariffNotFoundMessage(keyDto.cargo_type, keyDto.tariff_date));
    }
    return deleted;
  }

  async listTariffs(date: string): Promise<TariffRecord[]> {
    return this.unitOfWork.run(scope => this.tariffRepository.list(scope, date));
  }

  private async ensureRegistered(scope: TariffScope, cargoTypes: string[]): Promise<void> {
    if (!this.cargoTypeService.isRegistrationRequired) {
      return;
    }

    const missing = await this.cargoTypeService.findMissing(cargoTypes, scope.queryRunner.manager);
    if (missing.length > 0) {
      throw new UnprocessableEntityException(
        `Cargo types are not registered: ${missing.map(name => `'${name}'`).join(', ')}`,
      );
    }
  }

  private async hasUnregistered(scope: TariffScope, cargoTypes: string[]): Promise<boolean> {
    if (!this.cargoTypeService.isRegistrationRequired) {
      return false;
    }

    const missing = await this.cargoTypeService.findMissing(cargoTypes, scope.queryRunner.manager);
    return missing.length > 0;
  }
}
