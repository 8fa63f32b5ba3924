import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Account } from '../accounts/account.entity';
import { SettingsModule } from '../settings/settings.module';
import { CircuitBreakerFactory } from '../common/circuit-breaker.factory';
import { CircuitBreakerModule } from '../common/circuit-breaker.module';
import type { EnvironmentVariables } from '../config/env.validation';
import { EnrichmentModule } from './enrichment.module';
import { EnrichmentProcessor } from './enrichment.processor';
import { HttpAgentClient } from './providers/http-agent.client';
import { MockAgentClient } from './providers/mock-agent.client';
import { AGENT_CLIENT } from './interfaces/agent-client.interface';

/**
 * Runs the queue consumer. Kept apart from `EnrichmentModule` so the HTTP
 * surface can be started without a worker.
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([Account]),
    EnrichmentModule,
    SettingsModule,
    CircuitBreakerModule,
  ],
  providers: [
    EnrichmentProcessor,
    {
      provide: AGENT_CLIENT,
      useFactory: (
        configService: ConfigService<EnvironmentVariables, true>,
        breakerFactory: CircuitBreakerFactory,
      ) => {
        const provider = configService.get('AGENT_PROVIDER', { infer: true });

        switch (provider) {
          case 'mock':
            return new MockAgentClient();
          case 'http':
          default:
            return new HttpAgentClient(breakerFactory, configService);
        }
      },
      inject: [ConfigService, CircuitBreakerFactory],
    },
  ],
})
export class EnrichmentWorkerModule {}
