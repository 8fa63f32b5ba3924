import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Settings } from './settings.entity';
import { SettingsService } from './settings.service';
import { SettingsController } from './settings.controller';
import { ApiTokenGuard } from '../auth/api-token.guard';

@Module({
  imports: [TypeOrmModule.forFeature([Settings])],
  controllers: [SettingsController],
  providers: [SettingsService, ApiTokenGuard],
  exports: [SettingsService, ApiTokenGuard],
})
export class SettingsModule {}
