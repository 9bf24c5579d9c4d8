import { Transform } from 'class-transformer';
import { IsNotEmpty, IsNumber, IsPositive, IsString, MaxLength } from 'class-validator';
import { numericValue, rawValue } from '../../../common/validation/raw-value.transform';

/**
 * One entry of a date's list in the load payload
 */
export class PlainTariffDto {
  @Transform(rawValue)
  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  cargo_type!: string;

  @Transform(numericValue)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  rate!: number;
}
