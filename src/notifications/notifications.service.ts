import { Injectable, Logger } from '@nestjs/common';
import { WebSocket } from 'ws';
import type { EnrichmentCompleteEvent } from './enrichment-event';

/** The part of a `ws` socket the service relies on. */
export interface PushSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
}

/**
 * Tracks which sockets watch which account. A socket watches at most one
 * account at a time.
 */
@Injectable()
export class NotificationsService {
  private readonly logger = new Logger(NotificationsService.name);
  private readonly subscribers = new Map<number, Set<PushSocket>>();
  private readonly socketToAccount = new Map<PushSocket, number>();

  subscribe(socket: PushSocket, accountId: number): void {
    this.unsubscribe(socket);

    let sockets = this.subscribers.get(accountId);
    if (!sockets) {
      sockets = new Set();
      this.subscribers.set(accountId, sockets);
    }
    sockets.add(socket);
    this.socketToAccount.set(socket, accountId);

    this.logger.debug(`Socket subscribed to account ${accountId}`);
  }

  unsubscribe(socket: PushSocket): void {
    const accountId = this.socketToAccount.get(socket);
    if (accountId === undefined) return;

    this.socketToAccount.delete(socket);
    const sockets = this.subscribers.get(accountId);
    sockets?.delete(socket);
    if (sockets?.size === 0) {
      this.subscribers.delete(accountId);
    }
  }

  /**
   * Sends the event to every open socket watching the account. Returns the
   * number of sockets it was handed to.
   */
  publish(event: EnrichmentCompleteEvent): number {
    const sockets = this.subscribers.get(event.accountId);
    if (!sockets) return 0;

    const payload = JSON.stringify(event);
    let delivered = 0;

    for (const socket of sockets) {
      if (socket.readyState !== WebSocket.OPEN) continue;

      socket.send(payload, (error) => {
        if (error) {
          this.logger.warn(
            `Failed to push ${event.type} for account ${event.accountId}: ${error.message}`,
          );
        }
      });
      delivered++;
    }

    this.logger.log(
      `Published ${event.type} (${event.status}) for account ${event.accountId} to ${delivered} socket(s)`,
    );
    return delivered;
  }
}
