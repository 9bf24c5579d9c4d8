import { Transform } from 'class-transformer';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { rawValue } from '../../../common/validation/raw-value.transform';

export class CargoTypeNameDto {
  @Transform(rawValue)
  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  name!: string;
}
