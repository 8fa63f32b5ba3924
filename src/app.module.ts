import { Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { BullModule } from '@nestjs/bullmq';
import { AppController } from './app.controller';
import { CircuitBreakerModule } from './common/circuit-breaker.module';
import { validateEnv } from './config/env.validation';
import type { EnvironmentVariables } from './config/env.validation';
import { SettingsModule } from './settings/settings.module';
import { AccountsModule } from './accounts/accounts.module';
import { ContactsModule } from './contacts/contacts.module';
import { NotificationsModule } from './notifications/notifications.module';
import { EnrichmentModule } from './enrichment/enrichment.module';
import { EnrichmentWorkerModule } from './enrichment/enrichment-worker.module';

type AppConfigService = ConfigService<EnvironmentVariables, true>;

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    LoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: AppConfigService) => ({
        pinoHttp: {
          level: configService.get('LOG_LEVEL', { infer: true }),
          transport:
            configService.get('NODE_ENV', { infer: true }) !== 'production'
              ? { target: 'pino-pretty', options: { colorize: true } }
              : undefined,
          redact: [
            'req.headers.authorization',
            'req.headers["x-api-key"]',
            '[*].email',
            '[*].apiToken',
            '[*].agentApiKey',
          ],
        },
      }),
    }),
    PrometheusModule.register({
      path: '/metrics',
    }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: AppConfigService): TypeOrmModuleOptions =>
        configService.get('DB_TYPE', { infer: true }) === 'postgres'
          ? {
              type: 'postgres',
              url: configService.get('DATABASE_URL', { infer: true }),
              autoLoadEntities: true,
              synchronize: true,
            }
          : {
              type: 'better-sqlite3',
              database: configService.get('DATABASE_PATH', { infer: true }),
              autoLoadEntities: true,
              synchronize: true,
            },
    }),
    BullModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: AppConfigService) => ({
        connection: {
          host: configService.get('REDIS_HOST', { infer: true }),
          port: configService.get('REDIS_PORT', { infer: true }),
        },
      }),
    }),
    CircuitBreakerModule,
    SettingsModule,
    AccountsModule,
    ContactsModule,
    NotificationsModule,
    EnrichmentModule,
    EnrichmentWorkerModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
