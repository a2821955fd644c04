/**
 * File Registry
 *
 * Authoritative in-memory map of the watched directory. Every mutation
 * assigns the next version for the name; removed names leave a tombstone
 * so a file that reappears keeps counting upward instead of restarting
 * at 1.
 *
 * Mutations are synchronous, so on the single event loop they are
 * linearizable: two updates to one name never share a version. The
 * EventSequencer is the only caller of upsert/remove.
 */

import { compareEntries, type FileEntry } from '@meshwatch/core';

export class FileRegistry {
  private entries: Map<string, FileEntry> = new Map();
  private tombstones: Map<string, number> = new Map();

  /**
   * Create or update an entry, incrementing its version
   */
  upsert(name: string, mtime: number, size: number, contentDigest?: string): FileEntry {
    const previous = this.entries.get(name);
    const baseVersion = previous?.version ?? this.tombstones.get(name) ?? 0;

    const entry: FileEntry = {
      name,
      mtime,
      size,
      version: baseVersion + 1,
    };
    if (contentDigest !== undefined) {
      entry.contentDigest = contentDigest;
    }

    this.entries.set(name, entry);
    this.tombstones.delete(name);
    return entry;
  }

  /**
   * Tombstone and delete an entry.
   * Returns the tombstone version, or undefined if the name is not live.
   */
  remove(name: string): number | undefined {
    const entry = this.entries.get(name);
    if (!entry) {
      return undefined;
    }

    const tombstone = entry.version + 1;
    this.entries.delete(name);
    this.tombstones.set(name, tombstone);
    return tombstone;
  }

  get(name: string): FileEntry | undefined {
    const entry = this.entries.get(name);
    return entry ? { ...entry } : undefined;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Live entries, newest first; equal mtimes ordered by name
   */
  snapshot(): FileEntry[] {
    return Array.from(this.entries.values(), entry => ({ ...entry })).sort(compareEntries);
  }
}
