import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, Repository } from 'typeorm';
import { CargoType } from './entities/cargo-type.entity';

interface CargoTypeRow {
  id: number;
  name: string;
}

/**
 * CargoTypeService - registry of known cargo types
 *
 * With CARGO_TYPES_REQUIRE_REGISTRATION enabled, tariff operations only
 * accept cargo types registered here.
 */
@Injectable()
export class CargoTypeService {
  private readonly logger = new Logger(CargoTypeService.name);
  readonly isRegistrationRequired: boolean;

  constructor(
    @InjectRepository(CargoType)
    private readonly cargoTypeRepository: Repository<CargoType>,
    configService: ConfigService,
  ) {
    this.isRegistrationRequired = configService.get<boolean>('CARGO_TYPES_REQUIRE_REGISTRATION', false);
  }

  async findAll(): Promise<CargoType[]> {
    return this.cargoTypeRepository.find({ order: { name: 'ASC' } });
  }

  /**
   * Registers cargo types, skipping names that already exist
   *
   * @returns the newly registered cargo types only
   */
  async register(names: string[]): Promise<CargoType[]> {
    const result = await this.cargoTypeRepository
      .createQueryBuilder()
      .insert()
      .into(CargoType)
      .values(names.map(name => ({ name })))
      .orIgnore()
      .returning(['id', 'name'])
      .updateEntity(false)
      .execute();

    const rows: CargoTypeRow[] = result.raw;
    const registered = rows.map(row => this.cargoTypeRepository.create({ id: row.id, name: row.name }));

    this.logger.log({
      event: 'cargo_types_register',
      requested: names.length,
      registered: registered.map(cargoType => cargoType.name),
    });

    return registered;
  }

  /**
   * @returns the removed cargo type, or `null` when the name is unknown
   */
  async remove(name: string): Promise<CargoType | null> {
    const result = await this.cargoTypeRepository
      .createQueryBuilder()
      .delete()
      .from(CargoType)
      .where('name = :name', { name })
      .returning(['id', 'name'])
      .execute();

    const rows: CargoTypeRow[] = result.raw;
    if (rows.length === 0) {
      return null;
    }

    this.logger.log({ event: 'cargo_type_remove', name });
    return this.cargoTypeRepository.create({ id: rows[0].id, name: rows[0].name });
  }

  /**
   * Names among `names` that are not registered, in first-seen order
   *
   * Pass the scope's entity manager to read inside its transaction.
   */
  async findMissing(names: string[], manager?: EntityManager): Promise<string[]> {
    const unique = [...new Set(names)];
    if (unique.length === 0) {
      return [];
    }

    const repository = manager ? manager.getRepository(CargoType) : this.cargoTypeRepository;
    const found = await repository.find({ where: { name: In(unique) } });
    const known = new Set(found.map(cargoType => cargoType.name));

    return unique.filter(name => !known.has(name));
  }
}
