/**
 * Event Channel Protocol
 *
 * JSON messages exchanged over the /events WebSocket.
 *
 * server → client: added | modified | removed | resync_all | error
 * client → server: ping | quit
 *
 * Every inbound frame is validated with zod before it reaches
 * application code; nothing is trusted by shape alone.
 */

import { z } from 'zod';
import type { ChangeEvent, FileEntry } from './types/file.js';

// ============================================
// Schemas
// ============================================

const fileNameSchema = z.string().min(1).max(255);
const versionSchema = z.number().int().positive();

export const wireFileSchema = z.object({
  name: fileNameSchema,
  mtime: z.number().nonnegative(),
  size: z.number().int().nonnegative(),
  version: versionSchema,
  contentDigest: z.string().optional(),
});

export const fileChangedMessageSchema = z.object({
  type: z.enum(['added', 'modified']),
  name: fileNameSchema,
  mtime: z.number().nonnegative(),
  size: z.number().int().nonnegative(),
  version: versionSchema,
  contentDigest: z.string().optional(),
});

export const fileRemovedMessageSchema = z.object({
  type: z.literal('removed'),
  name: fileNameSchema,
  version: versionSchema,
});

export const resyncAllMessageSchema = z.object({
  type: z.literal('resync_all'),
  epoch: z.string().min(1),
  files: z.array(wireFileSchema),
});

export const errorMessageSchema = z.object({
  type: z.literal('error'),
  message: z.string(),
});

export const serverMessageSchema = z.union([
  fileChangedMessageSchema,
  fileRemovedMessageSchema,
  resyncAllMessageSchema,
  errorMessageSchema,
]);

export const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('quit') }),
]);

/**
 * Body of GET /api/files
 */
export const fileListResponseSchema = z.object({
  files: z.array(wireFileSchema),
  count: z.number().int().nonnegative(),
  epoch: z.string().min(1),
});

/**
 * Body of GET /health/ready
 */
export const readinessResponseSchema = z.object({
  status: z.enum(['ready', 'starting']),
  uptime: z.number(),
  timestamp: z.string(),
  checks: z.object({
    watcher: z.boolean(),
    initialScan: z.boolean(),
  }),
  files: z.number().int().nonnegative(),
  connections: z.number().int().nonnegative(),
  epoch: z.string(),
});

export type WireFile = z.infer<typeof wireFileSchema>;
export type FileListResponse = z.infer<typeof fileListResponseSchema>;
export type ReadinessResponse = z.infer<typeof readinessResponseSchema>;
export type FileChangedMessage = z.infer<typeof fileChangedMessageSchema>;
export type FileRemovedMessage = z.infer<typeof fileRemovedMessageSchema>;
export type ResyncAllMessage = z.infer<typeof resyncAllMessageSchema>;
export type ErrorMessage = z.infer<typeof errorMessageSchema>;
export type ServerMessage = z.infer<typeof serverMessageSchema>;
export type ClientMessage = z.infer<typeof clientMessageSchema>;

/**
 * Server messages that describe scene changes (everything but errors)
 */
export type SyncMessage = FileChangedMessage | FileRemovedMessage | ResyncAllMessage;

export type DecodeResult<T> =
  | { ok: true; message: T }
  | { ok: false; error: string };

// ============================================
// Encoding
// ============================================

export function toWireFile(entry: FileEntry): WireFile {
  const file: WireFile = {
    name: entry.name,
    mtime: entry.mtime,
    size: entry.size,
    version: entry.version,
  };
  if (entry.contentDigest !== undefined) {
    file.contentDigest = entry.contentDigest;
  }
  return file;
}

/**
 * Map a sequenced change event to its wire message
 */
export function encodeChangeEvent(event: ChangeEvent): SyncMessage {
  switch (event.type) {
    case 'added':
    case 'modified':
      return { type: event.type, ...toWireFile(event.entry) };
    case 'removed':
      return { type: 'removed', name: event.name, version: event.version };
    case 'resync_all':
      return {
        type: 'resync_all',
        epoch: event.epoch,
        files: event.files.map(toWireFile),
      };
  }
}

export function serializeMessage(message: ServerMessage | ClientMessage): string {
  return JSON.stringify(message);
}

// ============================================
// Decoding
// ============================================

function decodeWith<T>(schema: z.ZodType<T>, data: string): DecodeResult<T> {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    return { ok: false, error: 'Message is not valid JSON' };
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { ok: false, error: `Invalid message: ${path}${issue?.message ?? 'unknown shape'}` };
  }
  return { ok: true, message: result.data };
}

export function decodeServerMessage(data: string): DecodeResult<ServerMessage> {
  return decodeWith(serverMessageSchema, data);
}

export function decodeClientMessage(data: string): DecodeResult<ClientMessage> {
  return decodeWith(clientMessageSchema, data);
}
