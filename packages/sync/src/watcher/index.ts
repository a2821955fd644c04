/**
 * Watcher Module
 * 
 * File system watching and change settling components.
 */

export {
  FolderWatcher,
  DEFAULT_EXTENSIONS,
  type WatcherConfig,
  type RawChange,
  type RawChangeKind,
} from './folderWatcher.js';

export {
  NodeFileProbe,
  type FileProbe,
  type FileStat,
  type NodeFileProbeOptions,
} from './fileProbe.js';

export {
  ChangeDebouncer,
  DEFAULT_QUIET_PERIOD_MS,
  type ChangeDebouncerOptions,
  type SettledChange,
} from './changeDebouncer.js';
