import { Transform } from 'class-transformer';
import { IsNumber, IsPositive } from 'class-validator';
import { numericValue } from '../../../common/validation/raw-value.transform';
import { TariffKeyDto } from './tariff-key.dto';

export class EditTariffDto extends TariffKeyDto {
  @Transform(numericValue)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  new_rate!: number;
}
