/**
 * File Routes
 *
 * GET /api/files        registry snapshot, newest first; 503 until the initial scan completes
 * GET /content/:name    raw bytes of one registered file
 */

import type { FastifyPluginAsync } from 'fastify';
import { join } from 'node:path';
import { z } from 'zod';
import {
  MeshWatchError,
  NotFoundError,
  toWireFile,
  ValidationError,
  type FileListResponse,
} from '@meshwatch/core';
import type { SyncPipeline } from '@meshwatch/sync';
import { isPlainFileName, safeReadBytes } from '@meshwatch/utils';

export interface SyncRouteOptions {
  pipeline: SyncPipeline;
}

const contentParamsSchema = z.object({
  name: z.string().min(1).max(255),
});

export const fileListRoutes: FastifyPluginAsync<SyncRouteOptions> = async (fastify, { pipeline }) => {
  fastify.get('/', async (): Promise<FileListResponse> => {
    if (!pipeline.sequencer.ready) {
      throw new MeshWatchError('Initial scan in progress', 'NOT_READY', 503);
    }
    const files = pipeline.sequencer.snapshot().map(toWireFile);
    return {
      files,
      count: files.length,
      epoch: pipeline.sequencer.epoch,
    };
  });
};

export const contentRoutes: FastifyPluginAsync<SyncRouteOptions> = async (fastify, { pipeline }) => {
  fastify.get('/:name', async (request, reply) => {
    const { name } = contentParamsSchema.parse(request.params);

    if (!isPlainFileName(name)) {
      throw new ValidationError('name', 'must be a plain file name without path separators');
    }

    // Only names the registry holds are served, never arbitrary files
    const entry = pipeline.sequencer.get(name);
    if (!entry) {
      throw new NotFoundError('File', name);
    }

    const bytes = await safeReadBytes(join(pipeline.directory, name));
    if (!bytes) {
      // Deleted after the registry last saw it; the removal event is on its way
      throw new NotFoundError('File', name);
    }

    return reply
      .type('application/octet-stream')
      .header('cache-control', 'no-store')
      .header('x-meshwatch-version', String(entry.version))
      .send(bytes);
  });
};
