/**
 * Server Configuration
 *
 * Environment variables (optionally from a .env at the monorepo root)
 * validated with zod, then overridden by command-line flags.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ValidationError } from '@meshwatch/core';
import { normalizeExtensions } from '@meshwatch/utils';

const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

/**
 * Load .env from the monorepo root into process.env (existing values win)
 */
export function loadEnvFile(): void {
  dotenvConfig({ path: resolve(monorepoRoot, '.env') });
}

const booleanString = (fallback: 'true' | 'false') =>
  z.enum(['true', 'false', '1', '0']).default(fallback).transform(v => v === 'true' || v === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  MESHWATCH_HOST: z.string().min(1).default('127.0.0.1'),
  MESHWATCH_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  MESHWATCH_SCENE_DIR: z.string().min(1).default('scene'),

  // Sync tuning
  MESHWATCH_DEBOUNCE_MS: z.coerce.number().int().min(0).default(100),
  MESHWATCH_QUEUE_CAPACITY: z.coerce.number().int().min(1).default(256),
  MESHWATCH_EXTENSIONS: z.string().default('.obj'),
  MESHWATCH_DIGEST: booleanString('false'),
  // Comma-separated glob-like file name patterns the watcher skips
  MESHWATCH_IGNORE: z.string().default(''),

  // Clients silent for longer than this are dropped; 0 disables
  MESHWATCH_IDLE_TIMEOUT_MS: z.coerce.number().int().min(0).default(30000),
  MESHWATCH_ALLOW_REMOTE_QUIT: booleanString('true'),
});

export interface CliOverrides {
  host?: string;
  port?: number;
  sceneDir?: string;
  open?: boolean;
  debounce?: number;
}

export interface ServerConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  host: string;
  port: number;
  sceneDir: string;
  debounceMs: number;
  queueCapacity: number;
  extensions: string[];
  ignorePatterns: string[];
  digest: boolean;
  idleTimeoutMs: number;
  allowRemoteQuit: boolean;
  open: boolean;
}

/**
 * Build the server configuration. Relative scene directories resolve
 * against `cwd`. Throws ValidationError naming the offending variable.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: CliOverrides = {},
  cwd: string = process.cwd()
): ServerConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(issue?.path.join('.') || 'environment', issue?.message ?? 'invalid value');
  }
  const parsed = result.data;

  const port = overrides.port ?? parsed.MESHWATCH_PORT;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ValidationError('port', `must be an integer between 0 and 65535, got ${port}`);
  }

  const debounceMs = overrides.debounce ?? parsed.MESHWATCH_DEBOUNCE_MS;
  if (!Number.isInteger(debounceMs) || debounceMs < 0) {
    throw new ValidationError('debounce', `must be a non-negative integer, got ${debounceMs}`);
  }

  const extensions = normalizeExtensions(parsed.MESHWATCH_EXTENSIONS.split(','));
  if (extensions.length === 0) {
    throw new ValidationError('MESHWATCH_EXTENSIONS', 'at least one extension is required');
  }

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    host: overrides.host ?? parsed.MESHWATCH_HOST,
    port,
    sceneDir: resolve(cwd, overrides.sceneDir ?? parsed.MESHWATCH_SCENE_DIR),
    debounceMs,
    queueCapacity: parsed.MESHWATCH_QUEUE_CAPACITY,
    extensions,
    ignorePatterns: parsed.MESHWATCH_IGNORE.split(',').map(pattern => pattern.trim()).filter(Boolean),
    digest: parsed.MESHWATCH_DIGEST,
    idleTimeoutMs: parsed.MESHWATCH_IDLE_TIMEOUT_MS,
    allowRemoteQuit: parsed.MESHWATCH_ALLOW_REMOTE_QUIT,
    open: overrides.open ?? false,
  };
}
