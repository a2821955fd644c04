/**
 * Event Channel Route
 *
 * GET /events upgrades to a WebSocket and bridges it to a hub connection.
 * Silent clients are swept; transport-level pings keep browser clients,
 * which never send an application ping, counted as alive.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { WebSocket, RawData } from 'ws';
import type { ConnectionTransport } from '@meshwatch/sync';
import type { SyncRouteOptions } from './files.js';

export interface EventRouteOptions extends SyncRouteOptions {
  // 0 disables the idle sweep
  idleTimeoutMs: number;
}

const OPEN = 1;

function socketTransport(socket: WebSocket): ConnectionTransport {
  return {
    send: (data: string) =>
      new Promise<void>((resolve, reject) => {
        socket.send(data, (error?: Error) => (error ? reject(error) : resolve()));
      }),
    close: (code: number, reason: string) => {
      socket.close(code, reason);
    },
  };
}

export const eventRoutes: FastifyPluginAsync<EventRouteOptions> = async (fastify, { pipeline, idleTimeoutMs }) => {
  const { hub } = pipeline;
  const sockets = new Map<string, WebSocket>();

  fastify.get('/', { websocket: true }, (socket: WebSocket, request) => {
    const connection = hub.connect(socketTransport(socket), request.ip);
    sockets.set(connection.id, socket);

    socket.on('message', (data: RawData) => {
      hub.handleClientMessage(connection, data.toString());
    });

    socket.on('pong', () => {
      hub.touch(connection);
    });

    socket.on('close', () => {
      sockets.delete(connection.id);
      hub.handleTransportClosed(connection);
    });

    socket.on('error', (error) => {
      request.log.warn({ err: error, connectionId: connection.id }, 'WebSocket error');
      sockets.delete(connection.id);
      hub.handleTransportClosed(connection, 'socket error');
    });
  });

  if (idleTimeoutMs <= 0) {
    return;
  }

  const sweepInterval = setInterval(() => {
    for (const id of hub.sweepIdle(idleTimeoutMs)) {
      sockets.get(id)?.terminate();
      sockets.delete(id);
    }
    for (const socket of sockets.values()) {
      if (socket.readyState === OPEN) {
        socket.ping();
      }
    }
  }, Math.max(1000, Math.floor(idleTimeoutMs / 3)));

  fastify.addHook('onClose', async () => {
    clearInterval(sweepInterval);
    sockets.clear();
  });
};
