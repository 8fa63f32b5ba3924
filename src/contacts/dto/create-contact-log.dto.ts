import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class CreateContactLogDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  subject!: string;

  // e.g. call, email, meeting
  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  contact_type!: string;

  @IsString()
  @IsOptional()
  notes?: string | null;
}
