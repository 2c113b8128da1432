/**
 * WebSocket ledger feed.
 * Relays committed ledger events (market.added, position.deposit, position.liquidate, ...)
 * to every connected client.
 */

import type { FastifyInstance } from 'fastify';
import { eventBus, EventType } from '../infra/eventBus.js';
import { toJson } from '../utils/json.js';
import { isoNow } from '../utils/time.js';

interface WSLike {
  readyState: number;
  send(data: string): void;
  on(event: string, cb: () => void): void;
}

const OPEN = 1;

const clients = new Set<WSLike>();

export function connectedClients(): number {
  return clients.size;
}

export const formatFeedMessage = (type: EventType | 'connected', data: unknown): string => toJson({
  type,
  data,
  ts: isoNow(),
});

/**
 * Register the /ws endpoint and subscribe it to the event bus.
 * @fastify/websocket must already be registered on the instance.
 * Returns the bus unsubscribe handle so the caller can detach on close.
 */
export async function registerWebSocket(app: FastifyInstance): Promise<() => void> {
  const unsubscribe = eventBus.on('*', (event, data) => {
    const message = formatFeedMessage(event, data);

    for (const ws of clients) {
      if (ws.readyState === OPEN) {
        ws.send(message);
      }
    }
  });

  app.get('/ws', { websocket: true }, (socket: WSLike) => {
    clients.add(socket);

    socket.send(formatFeedMessage('connected', { clients: clients.size }));

    socket.on('close', () => {
      clients.delete(socket);
    });

    socket.on('error', () => {
      clients.delete(socket);
    });
  });

  return unsubscribe;
}
