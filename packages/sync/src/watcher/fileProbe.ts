/**
 * File Probe
 *
 * Reads the filesystem metadata the registry records for a file. The
 * debouncer probes at the end of the quiet period, so what it sees is the
 * settled file rather than the first half-written version.
 */

import { join } from 'node:path';
import { calculateFileHash, safeStat } from '@meshwatch/utils';

export interface FileStat {
  mtime: number;
  size: number;
  contentDigest?: string;
}

export interface FileProbe {
  /**
   * Current metadata, or null when the file does not exist.
   * Rejects on any other I/O failure.
   */
  probe(name: string): Promise<FileStat | null>;
}

export interface NodeFileProbeOptions {
  directory: string;
  // Hash file contents into contentDigest
  digest?: boolean;
}

export class NodeFileProbe implements FileProbe {
  private readonly directory: string;
  private readonly digest: boolean;

  constructor(options: NodeFileProbeOptions) {
    this.directory = options.directory;
    this.digest = options.digest ?? false;
  }

  async probe(name: string): Promise<FileStat | null> {
    const path = join(this.directory, name);
    const stats = await safeStat(path);
    if (!stats || !stats.isFile) {
      return null;
    }

    const result: FileStat = { mtime: stats.mtimeMs, size: stats.size };
    if (this.digest) {
      try {
        result.contentDigest = await calculateFileHash(path);
      } catch (error) {
        // Deleted between stat and read
        if (await safeStat(path) === null) {
          return null;
        }
        throw error;
      }
    }
    return result;
  }
}
