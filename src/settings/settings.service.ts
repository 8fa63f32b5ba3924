import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { randomBytes } from 'crypto';
import { Settings, SETTINGS_ID } from './settings.entity';
import { UpdateSettingsDto } from './dto/update-settings.dto';
import type { EnvironmentVariables } from '../config/env.validation';

/** Settings as exposed over the API, with secrets masked. */
export interface SettingsView {
  api_token: string;
  agent_url: string | null;
  agent_api_key: string | null;
  base_url: string;
}

export function generateApiToken(): string {
  return randomBytes(32).toString('base64url');
}

export function maskSecret(secret: string | null): string | null {
  if (!secret) return secret;
  return secret.length <= 4 ? '****' : `****${secret.slice(-4)}`;
}

@Injectable()
export class SettingsService {
  private readonly logger = new Logger(SettingsService.name);
  private cached: Settings | null = null;
  private loading: Promise<Settings> | null = null;

  constructor(
    @InjectRepository(Settings)
    private readonly settingsRepository: Repository<Settings>,
    private readonly configService: ConfigService<EnvironmentVariables, true>,
  ) {}

  async get(): Promise<Settings> {
    if (this.cached) {
      return this.cached;
    }

    // Concurrent first reads share one load so only one token is generated
    if (!this.loading) {
      this.loading = this.load().finally(() => {
        this.loading = null;
      });
    }
    return this.loading;
  }

  private async load(): Promise<Settings> {
    let settings = await this.settingsRepository.findOne({
      where: { id: SETTINGS_ID },
    });

    if (!settings) {
      settings = await this.settingsRepository.save(
        this.settingsRepository.create(this.seedFromEnvironment()),
      );
      this.logger.log('Settings initialized from environment');
    } else if (!settings.apiToken) {
      settings.apiToken = this.generateToken();
      settings = await this.settingsRepository.save(settings);
    }

    this.cached = settings;
    return settings;
  }

  async update(dto: UpdateSettingsDto): Promise<Settings> {
    const current = await this.get();
    const settings = this.settingsRepository.create({ ...current });

    if (dto.api_token !== undefined) settings.apiToken = dto.api_token;
    if (dto.agent_url !== undefined) settings.agentUrl = dto.agent_url;
    if (dto.agent_api_key !== undefined) settings.agentApiKey = dto.agent_api_key;
    if (dto.base_url !== undefined) settings.baseUrl = dto.base_url;

    // The cache only changes once the row is stored
    const saved = await this.settingsRepository.save(settings);
    this.cached = saved;
    this.logger.log('Settings updated');
    return saved;
  }

  async isAgentConfigured(): Promise<boolean> {
    const { agentUrl, agentApiKey } = await this.get();
    return Boolean(agentUrl && agentApiKey);
  }

  toView(settings: Settings): SettingsView {
    return {
      api_token: settings.apiToken,
      agent_url: settings.agentUrl,
      agent_api_key: maskSecret(settings.agentApiKey),
      base_url: settings.baseUrl,
    };
  }

  private seedFromEnvironment(): Settings {
    const port = this.configService.get('PORT', { infer: true });
    const settings = new Settings();
    settings.id = SETTINGS_ID;
    settings.apiToken =
      this.configService.get('API_TOKEN', { infer: true }) ??
      this.generateToken();
    settings.agentUrl =
      this.configService.get('AGENT_API_URL', { infer: true }) ?? null;
    settings.agentApiKey =
      this.configService.get('AGENT_API_KEY', { infer: true }) ?? null;
    settings.baseUrl =
      this.configService.get('BASE_URL', { infer: true }) ??
      `http://localhost:${port}`;
    return settings;
  }

  private generateToken(): string {
    const token = generateApiToken();
    this.logger.warn(
      `No API token configured; generated one. Set API_TOKEN or PUT /api/settings to replace it: ${token}`,
    );
    return token;
  }
}
