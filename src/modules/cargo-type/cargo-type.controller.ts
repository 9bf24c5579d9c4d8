import { Body, Controller, Get, HttpCode, HttpStatus, NotFoundException, Post } from '@nestjs/common';
import { CargoTypeService } from './cargo-type.service';
import { CargoTypeNameDto } from './dto/cargo-type-name.dto';
import { RegisterCargoTypesDto } from './dto/register-cargo-types.dto';

/**
 * CargoTypeController - internal endpoints of the cargo type registry
 */
@Controller('internal/cargo_types')
export class CargoTypeController {
  constructor(private readonly cargoTypeService: CargoTypeService) {}

  /**
   * GET /api/internal/cargo_types
   */
  @Get()
  async findAll() {
    const cargoTypes = await this.cargoTypeService.findAll();
    return cargoTypes.map(cargoType => cargoType.toSafeObject());
  }

  /**
   * Register cargo types; names already registered are skipped
   * POST /api/internal/cargo_types/add
   */
  @Post('add')
  @HttpCode(HttpStatus.CREATED)
  async register(@Body() registerDto: RegisterCargoTypesDto) {
    const registered = await this.cargoTypeService.register(registerDto.names);
    return registered.map(cargoType => cargoType.toSafeObject());
  }

  /**
   * POST /api/internal/cargo_types/delete
   */
  @Post('delete')
  @HttpCode(HttpStatus.OK)
  async remove(@Body() nameDto: CargoTypeNameDto) {
    const removed = await this.cargoTypeService.remove(nameDto.name);
    if (!removed) {
      throw new NotFoundException(`Cargo type '${nameDto.name}' is not found`);
    }
    return removed.toSafeObject();
  }
}
