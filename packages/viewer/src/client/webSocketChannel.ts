/**
 * WebSocket event channel
 *
 * ChannelFactory backed by the `ws` client. Frames are validated against
 * the protocol schemas; invalid ones are logged and dropped.
 */

import WebSocket, { type RawData } from 'ws';
import { decodeServerMessage, serializeMessage } from '@meshwatch/core';
import { createLogger, type Logger } from '@meshwatch/utils';
import type { ChannelFactory, ChannelHandlers, EventChannel } from './reconnectSupervisor.js';

export interface WebSocketChannelOptions {
  // Give up on a connection attempt after this long
  handshakeTimeoutMs?: number;
  logger?: Logger;
}

/**
 * ws://host:port/events for an http(s) base URL
 */
export function eventsUrl(baseUrl: string): string {
  const url = new URL('/events', baseUrl);
  url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
  return url.toString();
}

export function createWebSocketChannel(
  url: string,
  options: WebSocketChannelOptions = {}
): ChannelFactory {
  const logger = options.logger ?? createLogger({ component: 'ws-channel' });

  return (handlers: ChannelHandlers) =>
    new Promise<EventChannel>((resolve, reject) => {
      const socket = new WebSocket(url, { handshakeTimeout: options.handshakeTimeoutMs ?? 5000 });
      let opened = false;

      const channel: EventChannel = {
        send(message) {
          if (socket.readyState === WebSocket.OPEN) {
            socket.send(serializeMessage(message));
          }
        },
        close() {
          socket.close(1000, 'Client closing');
        },
      };

      socket.on('open', () => {
        opened = true;
        resolve(channel);
      });

      socket.on('message', (data: RawData) => {
        const result = decodeServerMessage(data.toString());
        if (!result.ok) {
          logger.warn({ error: result.error }, 'Dropping malformed server message');
          return;
        }
        handlers.onMessage(result.message);
      });

      socket.on('error', (error) => {
        if (!opened) {
          reject(error);
          return;
        }
        logger.warn({ err: error }, 'WebSocket error');
      });

      socket.on('close', (code, reason) => {
        if (!opened) {
          reject(new Error(`Connection closed before opening (code ${code})`));
          return;
        }
        handlers.onClose(`closed with code ${code}${reason.length > 0 ? `: ${reason.toString()}` : ''}`);
      });
    });
}
