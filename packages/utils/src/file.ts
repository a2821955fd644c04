/**
 * File Operations
 * 
 * Safe file operations with proper error handling.
 */

import { readFile, stat } from 'node:fs/promises';
import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { isNotFoundError } from './guards.js';

export interface FileStats {
  mtimeMs: number;
  size: number;
  isFile: boolean;
  isDirectory: boolean;
}

/**
 * Safely read a file's bytes, returning null if it doesn't exist
 */
export async function safeReadBytes(filePath: string): Promise<Buffer | null> {
  try {
    return await readFile(filePath);
  } catch (error) {
    if (isNotFoundError(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Stat a path, returning null if it doesn't exist.
 * Any other failure (EACCES, EMFILE, ...) is rethrown.
 */
export async function safeStat(filePath: string): Promise<FileStats | null> {
  try {
    const stats = await stat(filePath);
    return {
      mtimeMs: Math.floor(stats.mtimeMs),
      size: stats.size,
      isFile: stats.isFile(),
      isDirectory: stats.isDirectory(),
    };
  } catch (error) {
    if (isNotFoundError(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Calculate the hash of a file
 */
export async function calculateFileHash(
  filePath: string,
  algorithm: 'md5' | 'sha1' | 'sha256' = 'sha256'
): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash(algorithm);
    const stream = createReadStream(filePath);
    
    stream.on('data', (data) => hash.update(data));
    stream.on('end', () => resolve(hash.digest('hex')));
    stream.on('error', reject);
  });
}
