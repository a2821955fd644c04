/**
 * @meshwatch/viewer
 *
 * Client side of the live sync: reconnecting event channel, scene
 * reconciliation and content fetching.
 */

export {
  ReconnectSupervisor,
  DEFAULT_BACKOFF,
  DEFAULT_PING_INTERVAL_MS,
} from './client/reconnectSupervisor.js';

export type {
  BackoffOptions,
  ChannelFactory,
  ChannelHandlers,
  EventChannel,
  ReconnectSupervisorOptions,
} from './client/reconnectSupervisor.js';

export { createWebSocketChannel, eventsUrl } from './client/webSocketChannel.js';
export type { WebSocketChannelOptions } from './client/webSocketChannel.js';

export { ContentClient } from './client/contentClient.js';

export { SceneReconciler } from './scene/sceneReconciler.js';
export type {
  ContentFetcher,
  LoadResult,
  MeshRenderer,
  RenderFlags,
  SceneOverlay,
  SceneReconcilerOptions,
} from './scene/sceneReconciler.js';

export { ViewerSession } from './session.js';
export type { ViewerSessionOptions } from './session.js';
