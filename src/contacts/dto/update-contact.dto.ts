import {
  IsEmail,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  ValidateIf,
} from 'class-validator';

/** Every field is optional; `null` clears an optional field. */
export class UpdateContactDto {
  @IsInt()
  @Min(1)
  @IsOptional()
  account_id?: number | null;

  @ValidateIf((_, value) => value !== undefined)
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  first_name?: string;

  @ValidateIf((_, value) => value !== undefined)
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  last_name?: string;

  @IsString()
  @IsOptional()
  title?: string | null;

  @IsEmail()
  @IsOptional()
  email?: string | null;

  @IsString()
  @IsOptional()
  linkedin?: string | null;

  @IsString()
  @IsOptional()
  notes?: string | null;
}
