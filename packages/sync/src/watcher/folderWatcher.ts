/**
 * Folder Watcher
 *
 * Monitors the watched directory with native fs.watch and reports raw,
 * undebounced notifications for mesh files. Settling is left to the
 * ChangeDebouncer; this layer only filters names and detects the loss of
 * the directory itself.
 *
 * Events:
 * - 'raw'   (RawChange)       a matching file was created, changed or removed
 * - 'lost'  (WatchLostError)  the directory became unwatchable; terminal
 * - 'ready' ({ directory })
 * - 'close'
 */

import { EventEmitter } from 'node:events';
import { watch, type FSWatcher } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { WatchLostError } from '@meshwatch/core';
import {
  createLogger,
  getExtension,
  isPartialFile,
  normalizeExtensions,
  safeStat,
  type Logger,
} from '@meshwatch/utils';

export type RawChangeKind = 'rename' | 'change';

export interface RawChange {
  name: string;
  kind: RawChangeKind;
  at: Date;
}

export interface WatcherConfig {
  // Directory to watch (non-recursive)
  directory: string;

  // File extensions to report; defaults to ['.obj']
  extensions?: string[];

  // Ignore hidden files
  ignoreHidden?: boolean;

  // Ignore partial writes and editor swap files
  ignorePartials?: boolean;

  // Patterns to ignore (glob-like, matched against the file name)
  ignorePatterns?: string[];

  logger?: Logger;
}

export const DEFAULT_EXTENSIONS = ['.obj'];

export class FolderWatcher extends EventEmitter {
  private readonly directory: string;
  private readonly extensions: string[];
  private readonly ignoreHidden: boolean;
  private readonly ignorePartials: boolean;
  private readonly ignorePatterns: RegExp[];
  private readonly logger: Logger;
  private watcher: FSWatcher | null = null;
  private isRunning = false;
  private lost = false;

  constructor(config: WatcherConfig) {
    super();

    this.directory = config.directory;
    this.extensions = normalizeExtensions(config.extensions ?? DEFAULT_EXTENSIONS);
    this.ignoreHidden = config.ignoreHidden ?? true;
    this.ignorePartials = config.ignorePartials ?? true;
    this.ignorePatterns = (config.ignorePatterns ?? []).map(compilePattern);
    this.logger = config.logger ?? createLogger({ component: 'folder-watcher' });
  }

  /**
   * Start watching. Throws WatchLostError if the directory is missing.
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error('Watcher is already running');
    }

    const stats = await safeStat(this.directory);
    if (!stats || !stats.isDirectory) {
      throw new WatchLostError(this.directory, new Error('not a directory'));
    }

    try {
      this.watcher = watch(this.directory, { recursive: false }, (eventType, filename) => {
        this.handleFileEvent(eventType, filename);
      });
    } catch (error) {
      throw new WatchLostError(this.directory, error);
    }

    this.watcher.on('error', (error) => {
      this.markLost(error);
    });

    this.isRunning = true;
    this.lost = false;
    this.logger.info({ directory: this.directory, extensions: this.extensions }, 'Watching directory');
    this.emit('ready', { directory: this.directory });
  }

  /**
   * Stop watching
   */
  stop(): void {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    if (this.isRunning) {
      this.isRunning = false;
      this.emit('close');
    }
  }

  /**
   * Names of all matching files currently in the directory, sorted
   */
  async scan(): Promise<string[]> {
    const entries = await readdir(this.directory, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && this.accepts(entry.name))
      .map(entry => entry.name)
      .sort();
  }

  /**
   * Whether a file name is reported by this watcher
   */
  accepts(filename: string): boolean {
    if (this.ignoreHidden && filename.startsWith('.')) {
      return false;
    }

    if (this.ignorePartials && isPartialFile(filename)) {
      return false;
    }

    if (this.extensions.length > 0 && !this.extensions.includes(getExtension(filename))) {
      return false;
    }

    return !this.ignorePatterns.some(pattern => pattern.test(filename));
  }

  get running(): boolean {
    return this.isRunning;
  }

  get watchedDirectory(): string {
    return this.directory;
  }

  // Private methods

  private handleFileEvent(eventType: string, filename: string | null): void {
    if (filename && this.accepts(filename)) {
      const change: RawChange = {
        name: filename,
        kind: eventType === 'change' ? 'change' : 'rename',
        at: new Date(),
      };
      this.emit('raw', change);
      return;
    }

    // A rename we cannot attribute to a mesh file may be the directory
    // itself being moved or deleted.
    if (eventType === 'rename') {
      this.verifyDirectory().catch((error: unknown) => {
        this.logger.warn({ err: error, directory: this.directory }, 'Directory check failed');
      });
    }
  }

  private async verifyDirectory(): Promise<void> {
    const stats = await safeStat(this.directory);
    if (!stats || !stats.isDirectory) {
      this.markLost(new Error('directory no longer exists'));
    }
  }

  private markLost(cause: unknown): void {
    if (this.lost) {
      return;
    }
    this.lost = true;
    const error = new WatchLostError(this.directory, cause);
    this.logger.error({ err: error }, 'Watch on directory lost');
    this.stop();
    this.emit('lost', error);
  }
}

function compilePattern(pattern: string): RegExp {
  // Simple glob matching
  return new RegExp(
    '^' + pattern
      .replace(/[.+^${}()|[\]\\]/g, '\\$&')
      .replace(/\*/g, '.*')
      .replace(/\?/g, '.') + '$',
    'i'
  );
}
