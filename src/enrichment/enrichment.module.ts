import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Account } from '../accounts/account.entity';
import { SettingsModule } from '../settings/settings.module';
import { NotificationsModule } from '../notifications/notifications.module';
import { metricsProviders } from '../common/metrics.providers';
import { EnrichmentService } from './enrichment.service';
import { EnrichmentController } from './enrichment.controller';
import { ENRICHMENT_QUEUE } from './enrichment.constants';

@Module({
  imports: [
    TypeOrmModule.forFeature([Account]),
    BullModule.registerQueue({ name: ENRICHMENT_QUEUE }),
    SettingsModule,
    NotificationsModule,
  ],
  controllers: [EnrichmentController],
  providers: [EnrichmentService, ...metricsProviders],
  exports: [EnrichmentService, ...metricsProviders],
})
export class EnrichmentModule {}
