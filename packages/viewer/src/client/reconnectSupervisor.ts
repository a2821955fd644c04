/**
 * Reconnect Supervisor
 *
 * Keeps the event channel to the server alive. Connection loss is never
 * surfaced as an error, only as a state change and a scheduled retry.
 *
 * State Flow:
 * disconnected --attempt--> connecting --success--> connected
 * connected --loss--> disconnected (retry scheduled)
 * disconnected --timer / retryNow()--> connecting
 * any --shutdown()--> draining (terminal, no further attempts)
 *
 * Backoff doubles from the initial delay up to the cap (1s, 2s, 4s, 8s,
 * 8s, ...) and resets on every successful connection. Retries never stop.
 *
 * Events:
 * - 'state'   (ConnectionState)
 * - 'message' (ServerMessage)
 * - 'retry'   (delayMs: number)
 */

import { EventEmitter } from 'node:events';
import {
  ConnectionStateMachine,
  type ClientMessage,
  type ConnectionState,
  type ServerMessage,
} from '@meshwatch/core';
import { backoffDelay, createLogger, type Logger } from '@meshwatch/utils';

export interface ChannelHandlers {
  onMessage(message: ServerMessage): void;
  onClose(reason: string): void;
}

export interface EventChannel {
  send(message: ClientMessage): void;
  close(): void;
}

/**
 * Opens one channel; resolves once it is usable, rejects if the attempt fails
 */
export type ChannelFactory = (handlers: ChannelHandlers) => Promise<EventChannel>;

export interface BackoffOptions {
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export interface ReconnectSupervisorOptions {
  connect: ChannelFactory;
  backoff?: Partial<BackoffOptions>;
  // Liveness ping while connected; 0 disables
  pingIntervalMs?: number;
  logger?: Logger;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  multiplier: 2,
};

export const DEFAULT_PING_INTERVAL_MS = 10_000;

export class ReconnectSupervisor extends EventEmitter {
  private readonly connect: ChannelFactory;
  private readonly backoff: BackoffOptions;
  private readonly pingIntervalMs: number;
  private readonly logger: Logger;
  private readonly machine = new ConnectionStateMachine('event-channel', 'disconnected');
  private channel: EventChannel | null = null;
  private retryTimer: NodeJS.Timeout | null = null;
  private pingTimer: NodeJS.Timeout | null = null;
  private failures = 0;
  private attempt = 0;

  constructor(options: ReconnectSupervisorOptions) {
    super();
    this.connect = options.connect;
    this.backoff = { ...DEFAULT_BACKOFF, ...options.backoff };
    this.pingIntervalMs = options.pingIntervalMs ?? DEFAULT_PING_INTERVAL_MS;
    this.logger = options.logger ?? createLogger({ component: 'reconnect-supervisor' });
  }

  /**
   * Begin connecting. Has no effect unless disconnected with no retry pending.
   */
  start(): void {
    if (this.state !== 'disconnected' || this.retryTimer) {
      return;
    }
    this.beginAttempt('start');
  }

  /**
   * Manual full reload: attempt immediately instead of waiting for the
   * retry timer. The backoff ladder is left where it is.
   */
  retryNow(): boolean {
    if (this.state !== 'disconnected') {
      return false;
    }
    this.clearRetryTimer();
    this.beginAttempt('manual retry');
    return true;
  }

  /**
   * Enter draining; no reconnect is attempted afterwards.
   * With notifyServer, a quit request is sent first if connected.
   */
  shutdown(options: { notifyServer?: boolean } = {}): void {
    if (this.machine.isTerminal()) {
      return;
    }

    this.clearRetryTimer();
    this.stopPing();

    const channel = this.channel;
    this.channel = null;
    const wasConnected = this.state === 'connected';
    this.transition('draining', 'shutdown requested');

    if (channel) {
      if (options.notifyServer && wasConnected) {
        channel.send({ type: 'quit' });
      }
      channel.close();
    }
  }

  /**
   * Send a message if connected; returns false otherwise
   */
  send(message: ClientMessage): boolean {
    if (!this.channel || this.state !== 'connected') {
      return false;
    }
    this.channel.send(message);
    return true;
  }

  get state(): ConnectionState {
    return this.machine.getState();
  }

  /**
   * Delay the next scheduled retry would use
   */
  get nextRetryDelay(): number {
    return backoffDelay(
      this.failures,
      this.backoff.initialDelayMs,
      this.backoff.maxDelayMs,
      this.backoff.multiplier
    );
  }

  get retryPending(): boolean {
    return this.retryTimer !== null;
  }

  // Private methods

  private beginAttempt(reason: string): void {
    const attempt = ++this.attempt;
    this.transition('connecting', reason);
    this.runAttempt(attempt).catch((error: unknown) => {
      this.logger.error({ err: error }, 'Connection attempt crashed');
    });
  }

  private async runAttempt(attempt: number): Promise<void> {
    let channel: EventChannel;
    try {
      channel = await this.connect(this.handlersFor(attempt));
    } catch (error) {
      if (attempt !== this.attempt || this.state !== 'connecting') {
        return;
      }
      this.logger.debug({ err: error }, 'Connection attempt failed');
      this.transition('disconnected', 'attempt failed');
      this.scheduleRetry();
      return;
    }

    if (attempt !== this.attempt || this.state !== 'connecting') {
      // Shut down (or superseded) while the attempt was in flight
      channel.close();
      return;
    }

    this.channel = channel;
    this.failures = 0;
    this.transition('connected', 'channel open');
    this.startPing();
  }

  private handlersFor(attempt: number): ChannelHandlers {
    return {
      onMessage: (message) => {
        if (attempt === this.attempt && this.state === 'connected') {
          this.emit('message', message);
        }
      },
      onClose: (reason) => {
        if (attempt !== this.attempt || this.state !== 'connected') {
          return;
        }
        this.logger.info({ reason }, 'Event channel lost');
        this.channel = null;
        this.stopPing();
        this.transition('disconnected', reason);
        this.scheduleRetry();
      },
    };
  }

  private scheduleRetry(): void {
    const delay = this.nextRetryDelay;
    this.failures++;
    this.clearRetryTimer();

    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      if (this.state === 'disconnected') {
        this.beginAttempt('retry timer');
      }
    }, delay);

    this.logger.info({ delayMs: delay }, 'Reconnecting after delay');
    this.emit('retry', delay);
  }

  private clearRetryTimer(): void {
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
  }

  private startPing(): void {
    if (this.pingIntervalMs <= 0) {
      return;
    }
    this.pingTimer = setInterval(() => {
      this.send({ type: 'ping' });
    }, this.pingIntervalMs);
  }

  private stopPing(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }

  private transition(state: ConnectionState, reason: string): void {
    this.machine.transitionTo(state, reason);
    this.emit('state', state);
  }
}
