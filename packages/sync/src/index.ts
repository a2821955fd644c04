/**
 * @meshwatch/sync
 * 
 * Server side of the live synchronization core.
 * 
 * Data flow:
 *   fs.watch → FolderWatcher → ChangeDebouncer → EventSequencer
 *     (mutates FileRegistry, stamps versions) → SubscriptionHub → clients
 * 
 * Key principles:
 * - The EventSequencer is the only writer of the registry
 * - Per-name event order is version order, end to end
 * - Every client sees a resync_all before any per-file event
 * - A slow client is resynced, never allowed to stall the producer
 */

// Registry
export { FileRegistry } from './registry/fileRegistry.js';

// File System Watcher and settling
export {
  FolderWatcher,
  DEFAULT_EXTENSIONS,
  type WatcherConfig,
  type RawChange,
  type RawChangeKind,
  NodeFileProbe,
  type FileProbe,
  type FileStat,
  type NodeFileProbeOptions,
  ChangeDebouncer,
  DEFAULT_QUIET_PERIOD_MS,
  type ChangeDebouncerOptions,
  type SettledChange,
} from './watcher/index.js';

// Sequencer
export {
  EventSequencer,
  type ChangeListener,
  type DirectorySource,
  type EventSequencerOptions,
} from './sequencer/eventSequencer.js';

// Hub
export {
  SubscriptionHub,
  HubConnection,
  DEFAULT_QUEUE_CAPACITY,
  type ConnectionTransport,
  type ConnectionStats,
  type SnapshotSource,
  type SubscriptionHubOptions,
} from './hub/subscriptionHub.js';

// Pipeline
export {
  SyncPipeline,
  type SyncPipelineOptions,
} from './pipeline.js';
