import { ClassSerializerInterceptor, ValidationPipe } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { WsAdapter } from '@nestjs/platform-ws';

/**
 * Global pipes, serialization and transports shared by `main.ts` and the
 * end-to-end tests.
 */
export function configureApp(
  app: NestExpressApplication,
): NestExpressApplication {
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.useGlobalInterceptors(new ClassSerializerInterceptor(app.get(Reflector)));
  app.useWebSocketAdapter(new WsAdapter(app));

  // Agents may post their answer as plain text
  app.useBodyParser('text', { type: 'text/*' });

  return app;
}
