/**
 * CLI Configuration
 */

import { z } from 'zod';
import { ValidationError } from '@meshwatch/core';

const envSchema = z.object({
  MESHWATCH_URL: z.string().url().default('http://127.0.0.1:8080'),
});

export interface ClientFlags {
  url?: string;
  backoffMax?: number;
}

export interface ClientConfig {
  serverUrl: string;
  maxBackoffMs: number;
}

export const DEFAULT_MAX_BACKOFF_MS = 8000;

export function loadClientConfig(
  env: NodeJS.ProcessEnv = process.env,
  flags: ClientFlags = {}
): ClientConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError('MESHWATCH_URL', parsed.error.issues[0]?.message ?? 'invalid URL');
  }

  const serverUrl = flags.url ?? parsed.data.MESHWATCH_URL;
  if (!z.string().url().safeParse(serverUrl).success) {
    throw new ValidationError('url', `not a valid URL: ${serverUrl}`);
  }

  return {
    serverUrl: serverUrl.replace(/\/+$/, ''),
    maxBackoffMs: flags.backoffMax ?? DEFAULT_MAX_BACKOFF_MS,
  };
}
