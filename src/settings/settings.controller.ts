import { Body, Controller, Get, Put, UseGuards } from '@nestjs/common';
import { ApiTokenGuard } from '../auth/api-token.guard';
import { SettingsService, SettingsView } from './settings.service';
import { UpdateSettingsDto } from './dto/update-settings.dto';

@Controller('api/settings')
@UseGuards(ApiTokenGuard)
export class SettingsController {
  constructor(private readonly settingsService: SettingsService) {}

  @Get()
  async get(): Promise<SettingsView> {
    return this.settingsService.toView(await this.settingsService.get());
  }

  @Put()
  async update(@Body() dto: UpdateSettingsDto): Promise<SettingsView> {
    return this.settingsService.toView(await this.settingsService.update(dto));
  }
}
