/**
 * Path Utilities
 */

import { extname, basename } from 'node:path';

// Editor swap files and partial writes that never hold a finished mesh
const PARTIAL_PATTERNS = [
  /\.part$/i,
  /\.partial$/i,
  /\.crdownload$/i,
  /\.download$/i,
  /\.tmp$/i,
  /\.temp$/i,
  /\.swp$/i,
  /~$/,
];

/**
 * Get file extension (lowercase, with dot)
 */
export function getExtension(filename: string): string {
  return extname(filename).toLowerCase();
}

/**
 * A bare file name: no directory component, no traversal, no null bytes
 */
export function isPlainFileName(name: string): boolean {
  if (name.length === 0 || name.length > 255) return false;
  if (name === '.' || name === '..') return false;
  if (/[/\\\0]/.test(name)) return false;
  return basename(name) === name;
}

export function isPartialFile(filename: string): boolean {
  return PARTIAL_PATTERNS.some(pattern => pattern.test(filename));
}

/**
 * Normalise an extension list such as "obj, .STL" to ['.obj', '.stl']
 */
export function normalizeExtensions(extensions: readonly string[]): string[] {
  return extensions
    .map(ext => ext.trim().toLowerCase())
    .filter(ext => ext.length > 0)
    .map(ext => (ext.startsWith('.') ? ext : `.${ext}`));
}
