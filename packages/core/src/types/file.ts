/**
 * File Types
 * 
 * The registry's view of the watched directory and the change events
 * derived from it.
 */

export interface FileEntry {
  /** File name relative to the watched directory; unique among live entries */
  name: string;
  /** Modification time, milliseconds since the epoch */
  mtime: number;
  size: number;
  /** Per-name counter, strictly increasing for the lifetime of the name */
  version: number;
  contentDigest?: string;
}

export interface AddedEvent {
  type: 'added';
  entry: FileEntry;
}

export interface ModifiedEvent {
  type: 'modified';
  entry: FileEntry;
}

export interface RemovedEvent {
  type: 'removed';
  name: string;
  /** Tombstone version: one greater than the last live version */
  version: number;
}

export interface ResyncAllEvent {
  type: 'resync_all';
  /** Identifies the server process whose version space the snapshot uses */
  epoch: string;
  files: FileEntry[];
}

export type ChangeEvent = AddedEvent | ModifiedEvent | RemovedEvent | ResyncAllEvent;

export type ChangeEventType = ChangeEvent['type'];

/**
 * Registry listing order: newest first, equal mtimes by name
 */
export function compareEntries(a: FileEntry, b: FileEntry): number {
  if (a.mtime !== b.mtime) {
    return b.mtime - a.mtime;
  }
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}
