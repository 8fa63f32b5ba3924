import { IsNotEmpty, IsOptional, IsString, IsUrl, ValidateIf } from 'class-validator';

export class UpdateSettingsDto {
  @ValidateIf((_, value) => value !== undefined)
  @IsString()
  @IsNotEmpty()
  api_token?: string;

  @IsUrl({ require_tld: false })
  @IsOptional()
  agent_url?: string | null;

  @IsString()
  @IsOptional()
  agent_api_key?: string | null;

  @ValidateIf((_, value) => value !== undefined)
  @IsUrl({ require_tld: false })
  base_url?: string;
}
