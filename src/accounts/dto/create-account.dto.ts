import { IsEnum, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { Industry } from '../industry.enum';

export class CreateAccountDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

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
