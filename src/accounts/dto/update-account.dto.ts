import {
  IsEnum,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  ValidateIf,
} from 'class-validator';
import { Industry } from '../industry.enum';

/** Every field is optional; `null` clears an optional field. */
export class UpdateAccountDto {
  // name can be changed but never cleared
  @ValidateIf((_, value) => value !== undefined)
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name?: string;

  @IsEnum(Industry)
  @IsOptional()
  industry?: Industry | null;

  @IsString()
  @IsOptional()
  website?: string | null;

  @IsString()
  @IsOptional()
  notes?: string | null;
}
