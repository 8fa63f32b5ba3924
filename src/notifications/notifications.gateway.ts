import { Logger } from '@nestjs/common';
import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  SubscribeMessage,
  WebSocketGateway,
  WsResponse,
} from '@nestjs/websockets';
import type { IncomingMessage } from 'http';
import { NotificationsService, PushSocket } from './notifications.service';

interface SubscribePayload {
  accountId?: unknown;
}

export function parseAccountId(value: unknown): number | null {
  const id = typeof value === 'string' ? Number(value) : value;
  return typeof id === 'number' && Number.isInteger(id) && id > 0 ? id : null;
}

/**
 * Clients watch one account, chosen with `?accountId=` on the connection URL
 * or with a `subscribe` message.
 */
@WebSocketGateway({ path: '/ws' })
export class NotificationsGateway
  implements OnGatewayConnection, OnGatewayDisconnect
{
  private readonly logger = new Logger(NotificationsGateway.name);

  constructor(private readonly notificationsService: NotificationsService) {}

  handleConnection(client: PushSocket, request?: IncomingMessage): void {
    const url = new URL(request?.url ?? '/', 'http://localhost');
    const accountId = parseAccountId(url.searchParams.get('accountId'));

    if (accountId !== null) {
      this.notificationsService.subscribe(client, accountId);
    }
  }

  handleDisconnect(client: PushSocket): void {
    this.notificationsService.unsubscribe(client);
  }

  @SubscribeMessage('subscribe')
  handleSubscribe(
    @ConnectedSocket() client: PushSocket,
    @MessageBody() payload: SubscribePayload | undefined,
  ): WsResponse<{ accountId: number } | { error: string }> {
    const accountId = parseAccountId(payload?.accountId);

    if (accountId === null) {
      this.logger.warn('Rejected subscribe without a valid accountId');
      return {
        event: 'error',
        data: { error: 'accountId must be a positive integer' },
      };
    }

    this.notificationsService.subscribe(client, accountId);
    return { event: 'subscribed', data: { accountId } };
  }
}
