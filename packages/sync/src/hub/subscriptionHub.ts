/**
 * Subscription Hub
 *
 * Tracks connected viewer clients and delivers the ordered event stream
 * to each of them.
 *
 * Per connection:
 * - the first message is always a resync_all of the current snapshot;
 *   until the initial scan completes nothing is queued, and the baseline
 *   resync_all published at the end of the scan becomes that first message
 * - a bounded FIFO queue drained by one delivery flow, one send at a time
 * - on overflow the queued per-file events are dropped and replaced by a
 *   single resync_all, so a slow client costs bounded memory and never
 *   stalls the producer
 *
 * Queues are owned by their connection; nothing mutable is shared
 * between connections.
 */

import {
  ConnectionStateMachine,
  decodeClientMessage,
  encodeChangeEvent,
  serializeMessage,
  type ChangeEvent,
  type ConnectionState,
  type ResyncAllEvent,
  type ServerMessage,
} from '@meshwatch/core';
import { createLogger, type Logger } from '@meshwatch/utils';

export interface ConnectionTransport {
  /** Resolves once the frame has been handed to the network */
  send(data: string): Promise<void>;
  close(code: number, reason: string): void;
}

export interface SnapshotSource {
  /** False until the baseline snapshot exists */
  readonly ready: boolean;
  resyncEvent(): ResyncAllEvent;
}

export interface SubscriptionHubOptions {
  source: SnapshotSource;
  // Maximum queued messages per connection before falling back to a resync
  queueCapacity?: number;
  // Called when a client asks the server to shut down
  onQuit?: (connection: HubConnection) => void;
  logger?: Logger;
}

export interface ConnectionStats {
  id: string;
  state: ConnectionState;
  queued: number;
  sent: number;
  overflows: number;
  lastSeen: number;
  remoteAddress?: string;
}

export const DEFAULT_QUEUE_CAPACITY = 256;

// Close codes
const CLOSE_GOING_AWAY = 1001;
const CLOSE_IDLE = 4000;

export class HubConnection {
  readonly id: string;
  readonly remoteAddress?: string;
  readonly machine: ConnectionStateMachine;
  readonly transport: ConnectionTransport;
  queue: ServerMessage[] = [];
  sending = false;
  sent = 0;
  overflows = 0;
  lastSeen: number;

  constructor(id: string, transport: ConnectionTransport, remoteAddress?: string) {
    this.id = id;
    this.transport = transport;
    this.remoteAddress = remoteAddress;
    this.machine = new ConnectionStateMachine(id, 'connecting');
    this.lastSeen = Date.now();
  }

  get state(): ConnectionState {
    return this.machine.getState();
  }

  get open(): boolean {
    const state = this.state;
    return state === 'connecting' || state === 'connected';
  }

  stats(): ConnectionStats {
    return {
      id: this.id,
      state: this.state,
      queued: this.queue.length,
      sent: this.sent,
      overflows: this.overflows,
      lastSeen: this.lastSeen,
      remoteAddress: this.remoteAddress,
    };
  }
}

export class SubscriptionHub {
  private readonly source: SnapshotSource;
  private readonly queueCapacity: number;
  private readonly onQuit?: (connection: HubConnection) => void;
  private readonly logger: Logger;
  private connections: Map<string, HubConnection> = new Map();
  private draining = false;
  private nextId = 1;

  constructor(options: SubscriptionHubOptions) {
    this.source = options.source;
    this.queueCapacity = Math.max(1, options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY);
    this.onQuit = options.onQuit;
    this.logger = options.logger ?? createLogger({ component: 'subscription-hub' });
  }

  /**
   * Register a client. Its first message is a full resync, sent now or,
   * while the initial scan runs, when the baseline is published.
   */
  connect(transport: ConnectionTransport, remoteAddress?: string): HubConnection {
    const connection = new HubConnection(`conn_${this.nextId++}`, transport, remoteAddress);

    if (this.draining) {
      connection.machine.transitionTo('draining', 'hub is draining');
      transport.close(CLOSE_GOING_AWAY, 'Server shutting down');
      return connection;
    }

    this.connections.set(connection.id, connection);
    this.logger.info({ connectionId: connection.id, remoteAddress }, 'Client connected');

    if (this.source.ready) {
      this.enqueue(connection, encodeChangeEvent(this.source.resyncEvent()));
    } else {
      this.logger.debug({ connectionId: connection.id }, 'Holding connection until the initial scan completes');
    }
    return connection;
  }

  /**
   * Fan an event out to every live connection
   */
  publish(event: ChangeEvent): void {
    const message = encodeChangeEvent(event);
    for (const connection of this.connections.values()) {
      if (connection.open) {
        this.enqueue(connection, message);
      }
    }
  }

  /**
   * Handle a raw frame received from a client
   */
  handleClientMessage(connection: HubConnection, data: string): void {
    connection.lastSeen = Date.now();

    const result = decodeClientMessage(data);
    if (!result.ok) {
      this.logger.warn({ connectionId: connection.id, error: result.error }, 'Malformed client message');
      this.enqueue(connection, { type: 'error', message: result.error });
      return;
    }

    switch (result.message.type) {
      case 'ping':
        break;

      case 'quit':
        if (this.onQuit) {
          this.logger.info({ connectionId: connection.id }, 'Client requested shutdown');
          this.onQuit(connection);
        } else {
          this.logger.warn({ connectionId: connection.id }, 'Ignoring quit request; remote quit is disabled');
          this.enqueue(connection, { type: 'error', message: 'Remote quit is disabled' });
        }
        break;
    }
  }

  /**
   * Record liveness without a message (e.g. a transport-level pong)
   */
  touch(connection: HubConnection): void {
    connection.lastSeen = Date.now();
  }

  /**
   * The client's transport closed on its own
   */
  handleTransportClosed(connection: HubConnection, reason = 'transport closed'): void {
    this.disconnect(connection, reason);
  }

  /**
   * Close every connection with "going away" and refuse new ones. Terminal.
   */
  drain(reason = 'Server shutting down'): void {
    this.draining = true;
    for (const connection of this.connections.values()) {
      connection.queue = [];
      if (!connection.machine.isTerminal()) {
        connection.machine.transitionTo('draining', reason);
      }
      connection.transport.close(CLOSE_GOING_AWAY, reason);
    }
    this.logger.info({ connections: this.connections.size }, 'Hub drained');
    this.connections.clear();
  }

  /**
   * Close connections that have been silent for longer than timeoutMs
   */
  sweepIdle(timeoutMs: number, now: number = Date.now()): string[] {
    const closed: string[] = [];
    for (const connection of this.connections.values()) {
      if (now - connection.lastSeen > timeoutMs) {
        this.logger.warn({ connectionId: connection.id }, 'Client timed out');
        connection.transport.close(CLOSE_IDLE, 'Idle timeout');
        this.disconnect(connection, 'idle timeout');
        closed.push(connection.id);
      }
    }
    return closed;
  }

  get(id: string): HubConnection | undefined {
    return this.connections.get(id);
  }

  get size(): number {
    return this.connections.size;
  }

  get isDraining(): boolean {
    return this.draining;
  }

  stats(): { connections: number; draining: boolean; details: ConnectionStats[] } {
    return {
      connections: this.connections.size,
      draining: this.draining,
      details: Array.from(this.connections.values(), connection => connection.stats()),
    };
  }

  // Private methods

  private enqueue(connection: HubConnection, message: ServerMessage): void {
    if (!connection.open) {
      return;
    }

    if (message.type === 'resync_all') {
      // A snapshot supersedes everything queued before it
      connection.queue = [message];
    } else if (connection.queue.length >= this.queueCapacity) {
      connection.overflows++;
      this.logger.warn(
        { connectionId: connection.id, dropped: connection.queue.length },
        'Client fell behind, replacing queued events with a resync'
      );
      // The registry already reflects `message`, so the fresh snapshot covers it
      connection.queue = [encodeChangeEvent(this.source.resyncEvent())];
    } else {
      connection.queue.push(message);
    }

    this.deliver(connection);
  }

  private deliver(connection: HubConnection): void {
    if (connection.sending) {
      return;
    }
    this.pump(connection).catch((error: unknown) => {
      this.logger.error({ err: error, connectionId: connection.id }, 'Delivery flow failed');
    });
  }

  private async pump(connection: HubConnection): Promise<void> {
    connection.sending = true;
    try {
      let message = connection.queue.shift();
      while (message && connection.open) {
        await connection.transport.send(serializeMessage(message));
        connection.sent++;

        if (message.type === 'resync_all' && connection.state === 'connecting') {
          connection.machine.transitionTo('connected', 'initial resync delivered');
        }
        message = connection.queue.shift();
      }
    } catch (error) {
      this.logger.warn({ err: error, connectionId: connection.id }, 'Send failed, dropping client');
      connection.transport.close(CLOSE_GOING_AWAY, 'Send failed');
      this.disconnect(connection, 'send failed');
    } finally {
      connection.sending = false;
    }
  }

  private disconnect(connection: HubConnection, reason: string): void {
    if (connection.open) {
      connection.machine.transitionTo('disconnected', reason);
      this.logger.info({ connectionId: connection.id, reason }, 'Client disconnected');
    }
    connection.queue = [];
    this.connections.delete(connection.id);
  }
}
