import { Transform } from 'class-transformer';
import { IsNotEmpty, IsNumber, IsPositive, IsString, MaxLength } from 'class-validator';
import { IsCalendarDate } from '../../../common/validation/is-calendar-date.decorator';
import { numericValue, rawValue } from '../../../common/validation/raw-value.transform';

/**
 * DTO for evaluating the insurance cost of a shipment
 */
export class EvaluateCostDto {
  @Transform(rawValue)
  @IsCalendarDate()
  insurance_date!: string;

  @Transform(rawValue)
  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  cargo_type!: string;

  @Transform(numericValue)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  declared_price!: number;
}
