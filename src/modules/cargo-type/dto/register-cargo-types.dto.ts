import { Transform } from 'class-transformer';
import {
  ArrayNotEmpty,
  ArrayUnique,
  IsArray,
  IsNotEmpty,
  IsString,
  MaxLength,
} from 'class-validator';
import { rawValue } from '../../../common/validation/raw-value.transform';

/**
 * DTO for registering cargo types
 */
export class RegisterCargoTypesDto {
  @Transform(rawValue)
  @IsArray()
  @ArrayNotEmpty()
  @ArrayUnique()
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  @MaxLength(50, { each: true })
  names!: string[];
}
