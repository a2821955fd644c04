/**
 * Event Sequencer
 *
 * The single writer of the FileRegistry. Consumes settled changes,
 * mutates the registry and emits the resulting ChangeEvent, stamped with
 * the version the registry assigned.
 *
 * Ordering:
 * - start() scans the directory and emits one resync_all before any
 *   per-file event; changes that settle during the scan are buffered and
 *   applied after the baseline, in arrival order
 * - events for one name leave in version order; listeners are called
 *   synchronously, so nothing downstream can reorder them
 */

import { randomUUID } from 'node:crypto';
import type { ChangeEvent, FileEntry, ResyncAllEvent } from '@meshwatch/core';
import { createLogger, type Logger } from '@meshwatch/utils';
import { FileRegistry } from '../registry/fileRegistry.js';
import type { FileProbe, FileStat } from '../watcher/fileProbe.js';
import type { SettledChange } from '../watcher/changeDebouncer.js';

export type ChangeListener = (event: ChangeEvent) => void;

export interface DirectorySource {
  /** Names of all files to include in the baseline */
  scan(): Promise<string[]>;
}

export interface EventSequencerOptions {
  source: DirectorySource;
  probe: FileProbe;
  registry?: FileRegistry;
  epoch?: string;
  logger?: Logger;
}

export class EventSequencer {
  readonly epoch: string;
  private readonly registry: FileRegistry;
  private readonly source: DirectorySource;
  private readonly probe: FileProbe;
  private readonly logger: Logger;
  private listeners: Set<ChangeListener> = new Set();
  private pending: SettledChange[] = [];
  private isReady = false;
  private starting: Promise<void> | null = null;

  constructor(options: EventSequencerOptions) {
    this.source = options.source;
    this.probe = options.probe;
    this.registry = options.registry ?? new FileRegistry();
    this.epoch = options.epoch ?? randomUUID();
    this.logger = options.logger ?? createLogger({ component: 'event-sequencer' });
  }

  /**
   * Register a listener; returns an unsubscribe function
   */
  subscribe(listener: ChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Scan the directory and emit the baseline resync_all
   */
  start(): Promise<void> {
    this.starting ??= this.runInitialScan();
    return this.starting;
  }

  /**
   * Hand a settled change to the sequencer
   */
  submit(change: SettledChange): void {
    if (!this.isReady) {
      this.pending.push(change);
      return;
    }
    this.apply(change);
  }

  /**
   * Registry snapshot for readers
   */
  snapshot(): FileEntry[] {
    return this.registry.snapshot();
  }

  get(name: string): FileEntry | undefined {
    return this.registry.get(name);
  }

  resyncEvent(): ResyncAllEvent {
    return { type: 'resync_all', epoch: this.epoch, files: this.registry.snapshot() };
  }

  get ready(): boolean {
    return this.isReady;
  }

  get fileCount(): number {
    return this.registry.size;
  }

  // Private methods

  private async runInitialScan(): Promise<void> {
    const names = await this.source.scan();
    const stats = await Promise.all(names.map(name => this.probeForBaseline(name)));

    names.forEach((name, index) => {
      const stat = stats[index];
      if (stat) {
        this.registry.upsert(name, stat.mtime, stat.size, stat.contentDigest);
      }
    });

    this.isReady = true;
    this.logger.info({ files: this.registry.size, epoch: this.epoch }, 'Initial scan complete');
    this.emit(this.resyncEvent());

    const buffered = this.pending;
    this.pending = [];
    for (const change of buffered) {
      this.apply(change);
    }
  }

  private async probeForBaseline(name: string): Promise<FileStat | null> {
    try {
      return await this.probe.probe(name);
    } catch (error) {
      // Transient: a later watch event for this name will add it
      this.logger.warn({ err: error, name }, 'Skipping unreadable file in initial scan');
      return null;
    }
  }

  private apply(change: SettledChange): void {
    const event = change.kind === 'upsert'
      ? this.applyUpsert(change.name, change.stat)
      : this.applyRemove(change.name);

    if (event) {
      this.emit(event);
    }
  }

  private applyUpsert(name: string, stat: FileStat): ChangeEvent | null {
    const existing = this.registry.get(name);

    if (
      existing &&
      existing.mtime === stat.mtime &&
      existing.size === stat.size &&
      existing.contentDigest === stat.contentDigest
    ) {
      this.logger.debug({ name }, 'Ignoring change with identical metadata');
      return null;
    }

    const entry = this.registry.upsert(name, stat.mtime, stat.size, stat.contentDigest);
    this.logger.info({ name, version: entry.version }, existing ? 'File modified' : 'File added');
    return { type: existing ? 'modified' : 'added', entry };
  }

  private applyRemove(name: string): ChangeEvent | null {
    const version = this.registry.remove(name);
    if (version === undefined) {
      // Created and deleted within one quiet period, or never tracked
      return null;
    }
    this.logger.info({ name, version }, 'File removed');
    return { type: 'removed', name, version };
  }

  private emit(event: ChangeEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error({ err: error, type: event.type }, 'Change listener failed');
      }
    }
  }
}
