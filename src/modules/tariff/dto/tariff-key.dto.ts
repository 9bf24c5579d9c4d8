import { Transform } from 'class-transformer';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { IsCalendarDate } from '../../../common/validation/is-calendar-date.decorator';
import { rawValue } from '../../../common/validation/raw-value.transform';

/**
 * Identity of a tariff, as sent to the delete endpoint
 */
export class TariffKeyDto {
  @Transform(rawValue)
  @IsCalendarDate()
  tariff_date!: string;

  @Transform(rawValue)
  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  cargo_type!: string;
}
