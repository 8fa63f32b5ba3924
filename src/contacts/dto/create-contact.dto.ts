import {
  IsEmail,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';

export class CreateContactDto {
  @IsInt()
  @Min(1)
  @IsOptional()
  account_id?: number | null;

  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  first_name!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  last_name!: string;

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
