import { Test } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BullModule, getQueueToken } from '@nestjs/bullmq';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { WebSocket } from 'ws';
import { configureApp } from '../../src/app.setup';
import { AppController } from '../../src/app.controller';
import { CircuitBreakerModule } from '../../src/common/circuit-breaker.module';
import { validateEnv } from '../../src/config/env.validation';
import { SettingsModule } from '../../src/settings/settings.module';
import { AccountsModule } from '../../src/accounts/accounts.module';
import { ContactsModule } from '../../src/contacts/contacts.module';
import { NotificationsModule } from '../../src/notifications/notifications.module';
import { EnrichmentModule } from '../../src/enrichment/enrichment.module';
import { ENRICHMENT_QUEUE } from '../../src/enrichment/enrichment.constants';

export const TEST_TOKEN = 'test-secret';
export const AUTH = { Authorization: `Bearer ${TEST_TOKEN}` };

export interface TestApp {
  app: NestExpressApplication;
  queue: { add: jest.Mock; close: jest.Mock };
}

/**
 * The HTTP and WebSocket surface on in-memory SQLite. The enrichment queue is
 * a mock and no worker runs; agent answers are posted to the webhook.
 */
export async function createTestApp(): Promise<TestApp> {
  process.env.API_TOKEN = TEST_TOKEN;
  process.env.AGENT_API_URL = 'http://agent.test';
  process.env.AGENT_API_KEY = 'test-agent-key';
  process.env.BASE_URL = 'http://crm.test';

  const queue = {
    add: jest.fn().mockResolvedValue({}),
    close: jest.fn().mockResolvedValue(undefined),
  };

  const moduleFixture = await Test.createTestingModule({
    imports: [
      ConfigModule.forRoot({
        isGlobal: true,
        ignoreEnvFile: true,
        validate: validateEnv,
      }),
      TypeOrmModule.forRoot({
        type: 'better-sqlite3',
        database: ':memory:',
        autoLoadEntities: true,
        synchronize: true,
      }),
      BullModule.forRoot({ connection: { host: 'localhost', port: 6379 } }),
      CircuitBreakerModule,
      SettingsModule,
      AccountsModule,
      ContactsModule,
      NotificationsModule,
      EnrichmentModule,
    ],
    controllers: [AppController],
  })
    .overrideProvider(getQueueToken(ENRICHMENT_QUEUE))
    .useValue(queue)
    .compile();

  const app = moduleFixture.createNestApplication<NestExpressApplication>();
  configureApp(app);
  await app.listen(0, '127.0.0.1');

  return { app, queue };
}

export async function openSocket(
  app: NestExpressApplication,
  path: string,
): Promise<WebSocket> {
  const base = (await app.getUrl()).replace(/^http/, 'ws');

  return new Promise((resolve, reject) => {
    const socket = new WebSocket(`${base}${path}`);
    socket.once('open', () => resolve(socket));
    socket.once('error', reject);
  });
}

export function nextMessage(socket: WebSocket): Promise<unknown> {
  return new Promise((resolve, reject) => {
    socket.once('message', (data) => resolve(JSON.parse(data.toString())));
    socket.once('error', reject);
  });
}
