import { IsOptional, IsString, MaxLength } from 'class-validator';

export class TriggerEnrichmentDto {
  @IsString()
  @MaxLength(4000)
  @IsOptional()
  instructions?: string;
}
