/**
 * Viewer Session
 *
 * Glue for one client process: a ReconnectSupervisor feeding a
 * SceneReconciler, with content read over HTTP.
 */

import type { ConnectionState, ServerMessage } from '@meshwatch/core';
import { createLogger, type Logger } from '@meshwatch/utils';
import { ContentClient } from './client/contentClient.js';
import {
  ReconnectSupervisor,
  type BackoffOptions,
  type ChannelFactory,
} from './client/reconnectSupervisor.js';
import { createWebSocketChannel, eventsUrl } from './client/webSocketChannel.js';
import {
  SceneReconciler,
  type ContentFetcher,
  type MeshRenderer,
  type SceneOverlay,
} from './scene/sceneReconciler.js';

export interface ViewerSessionOptions<R> {
  baseUrl: string;
  renderer: MeshRenderer<R>;
  overlay?: SceneOverlay;
  backoff?: Partial<BackoffOptions>;
  pingIntervalMs?: number;
  // Called for server-side error messages and connection state changes
  onServerError?: (message: string) => void;
  onStateChange?: (state: ConnectionState) => void;
  // Overrides for tests
  channel?: ChannelFactory;
  fetchContent?: ContentFetcher;
  logger?: Logger;
}

export class ViewerSession<R> {
  readonly supervisor: ReconnectSupervisor;
  readonly reconciler: SceneReconciler<R>;
  readonly content: ContentClient;
  private readonly logger: Logger;
  private readonly onServerError?: (message: string) => void;

  constructor(options: ViewerSessionOptions<R>) {
    this.logger = options.logger ?? createLogger({ component: 'viewer-session' });
    this.onServerError = options.onServerError;
    this.content = new ContentClient(options.baseUrl);

    this.reconciler = new SceneReconciler<R>({
      renderer: options.renderer,
      overlay: options.overlay,
      fetchContent: options.fetchContent ?? ((name, signal) => this.content.fetchContent(name, signal)),
      logger: this.logger.child({ component: 'scene-reconciler' }),
    });

    this.supervisor = new ReconnectSupervisor({
      connect: options.channel ?? createWebSocketChannel(eventsUrl(options.baseUrl), {
        logger: this.logger.child({ component: 'ws-channel' }),
      }),
      backoff: options.backoff,
      pingIntervalMs: options.pingIntervalMs,
      logger: this.logger.child({ component: 'reconnect-supervisor' }),
    });

    this.supervisor.on('message', (message: ServerMessage) => this.handleMessage(message));
    if (options.onStateChange) {
      this.supervisor.on('state', options.onStateChange);
    }
  }

  start(): void {
    this.supervisor.start();
  }

  /**
   * Full reload: reconnect now if disconnected, refetch all content
   */
  reload(): void {
    this.supervisor.retryNow();
    this.reconciler.reloadAll();
  }

  /**
   * Ask the server to shut down, then stop
   */
  quit(): void {
    this.supervisor.shutdown({ notifyServer: true });
    this.reconciler.dispose();
  }

  close(): void {
    this.supervisor.shutdown();
    this.reconciler.dispose();
  }

  get state(): ConnectionState {
    return this.supervisor.state;
  }

  private handleMessage(message: ServerMessage): void {
    if (message.type === 'error') {
      this.logger.warn({ message: message.message }, 'Server reported an error');
      this.onServerError?.(message.message);
      return;
    }
    this.reconciler.apply(message);
  }
}
