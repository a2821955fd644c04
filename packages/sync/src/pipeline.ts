/**
 * Sync Pipeline
 *
 * Wires the watcher, debouncer, sequencer and hub for one watched
 * directory. The watcher starts before the initial scan so no change is
 * missed between the two; anything that settles mid-scan is buffered by
 * the sequencer.
 *
 * Events:
 * - 'lost' (WatchLostError)  fatal: the directory can no longer be watched
 * - 'change' (ChangeEvent)   every sequenced event
 */

import { EventEmitter } from 'node:events';
import type { ChangeEvent, WatchLostError } from '@meshwatch/core';
import { createLogger, type Logger } from '@meshwatch/utils';
import { FolderWatcher } from './watcher/folderWatcher.js';
import { NodeFileProbe, type FileProbe } from './watcher/fileProbe.js';
import { ChangeDebouncer } from './watcher/changeDebouncer.js';
import { EventSequencer } from './sequencer/eventSequencer.js';
import { SubscriptionHub, type HubConnection } from './hub/subscriptionHub.js';
import type { RawChange } from './watcher/folderWatcher.js';

export interface SyncPipelineOptions {
  directory: string;
  extensions?: string[];
  // Glob-like file name patterns the watcher skips
  ignorePatterns?: string[];
  quietPeriodMs?: number;
  queueCapacity?: number;
  // Hash file contents into each entry's contentDigest
  digest?: boolean;
  onQuit?: (connection: HubConnection) => void;
  // Overrides for tests
  probe?: FileProbe;
  watcher?: FolderWatcher;
  logger?: Logger;
}

export class SyncPipeline extends EventEmitter {
  readonly watcher: FolderWatcher;
  readonly debouncer: ChangeDebouncer;
  readonly sequencer: EventSequencer;
  readonly hub: SubscriptionHub;
  private readonly logger: Logger;
  private unsubscribe: (() => void) | null = null;

  constructor(options: SyncPipelineOptions) {
    super();
    this.logger = options.logger ?? createLogger({ component: 'sync-pipeline' });

    const probe = options.probe ?? new NodeFileProbe({
      directory: options.directory,
      digest: options.digest,
    });

    this.watcher = options.watcher ?? new FolderWatcher({
      directory: options.directory,
      extensions: options.extensions,
      ignorePatterns: options.ignorePatterns,
      logger: this.logger.child({ component: 'folder-watcher' }),
    });

    this.sequencer = new EventSequencer({
      source: this.watcher,
      probe,
      logger: this.logger.child({ component: 'event-sequencer' }),
    });

    this.debouncer = new ChangeDebouncer({
      probe,
      quietPeriodMs: options.quietPeriodMs,
      onSettled: change => this.sequencer.submit(change),
      logger: this.logger.child({ component: 'change-debouncer' }),
    });

    this.hub = new SubscriptionHub({
      source: this.sequencer,
      queueCapacity: options.queueCapacity,
      onQuit: options.onQuit,
      logger: this.logger.child({ component: 'subscription-hub' }),
    });
  }

  async start(): Promise<void> {
    this.watcher.on('raw', (change: RawChange) => {
      this.debouncer.notify(change.name);
    });
    this.watcher.on('lost', (error: WatchLostError) => {
      this.debouncer.stop();
      this.emit('lost', error);
    });

    this.unsubscribe = this.sequencer.subscribe((event: ChangeEvent) => {
      this.hub.publish(event);
      this.emit('change', event);
    });

    await this.watcher.start();
    await this.sequencer.start();
  }

  /**
   * Stop watching and close every client connection
   */
  stop(reason = 'Server shutting down'): void {
    this.debouncer.stop();
    this.watcher.stop();
    this.watcher.removeAllListeners('raw');
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.hub.drain(reason);
    this.logger.info('Sync pipeline stopped');
  }

  get directory(): string {
    return this.watcher.watchedDirectory;
  }
}
