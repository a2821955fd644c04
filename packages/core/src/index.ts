/**
 * @meshwatch/core
 *
 * Core package containing:
 * - File registry and scene data model
 * - Event channel protocol (zod schemas)
 * - Connection state machine
 * - Error handling
 */

// State machine
export {
  CONNECTION_STATES,
  ConnectionStateMachine,
  isValidTransition,
  getNextStates,
} from './stateMachine.js';

export type {
  ConnectionState,
  ConnectionStateTransition,
} from './stateMachine.js';

// Types
export { compareEntries } from './types/file.js';

export type {
  FileEntry,
  ChangeEvent,
  ChangeEventType,
  AddedEvent,
  ModifiedEvent,
  RemovedEvent,
  ResyncAllEvent,
} from './types/file.js';

export type {
  SceneObjectState,
  SceneObjectView,
} from './types/scene.js';

// Protocol
export {
  wireFileSchema,
  fileChangedMessageSchema,
  fileRemovedMessageSchema,
  resyncAllMessageSchema,
  errorMessageSchema,
  fileListResponseSchema,
  readinessResponseSchema,
  serverMessageSchema,
  clientMessageSchema,
  encodeChangeEvent,
  toWireFile,
  serializeMessage,
  decodeServerMessage,
  decodeClientMessage,
} from './protocol.js';

export type {
  WireFile,
  FileListResponse,
  ReadinessResponse,
  FileChangedMessage,
  FileRemovedMessage,
  ResyncAllMessage,
  ErrorMessage,
  ServerMessage,
  ClientMessage,
  SyncMessage,
  DecodeResult,
} from './protocol.js';

// Errors
export {
  MeshWatchError,
  ValidationError,
  StateTransitionError,
  NotFoundError,
  WatchLostError,
  BindError,
  ProtocolError,
} from './errors/index.js';
