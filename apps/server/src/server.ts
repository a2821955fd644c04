/**
 * Fastify Server Factory
 *
 * Creates and configures the Fastify instance around a sync pipeline.
 * Listening and starting the pipeline are left to the caller.
 */

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import websocket from '@fastify/websocket';
import compress from '@fastify/compress';
import type { SyncPipeline } from '@meshwatch/sync';
import type { Logger } from '@meshwatch/utils';

import { errorHandler } from './plugins/errorHandler.js';
import { contentRoutes, fileListRoutes } from './routes/files.js';
import { eventRoutes } from './routes/events.js';
import { healthRoutes } from './routes/health.js';

export interface CreateServerOptions {
  pipeline: SyncPipeline;
  logger: Logger;
  idleTimeoutMs?: number;
}

const VERSION = '0.1.0';

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const { pipeline } = options;
  const log: FastifyBaseLogger = options.logger;

  const server = Fastify({
    logger: log,
    requestTimeout: 30000,
    bodyLimit: 64 * 1024,
  });

  // ============================================
  // Security
  // ============================================

  await server.register(helmet, {
    // Mesh bytes are fetched cross-origin by viewer pages
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });

  await server.register(cors, {
    origin: true,
    methods: ['GET', 'OPTIONS'],
  });

  // ============================================
  // Performance
  // ============================================

  await server.register(compress, {
    encodings: ['gzip', 'deflate'],
  });

  // ============================================
  // WebSocket
  // ============================================

  await server.register(websocket, {
    options: {
      maxPayload: 64 * 1024,
    },
  });

  // ============================================
  // Error handling
  // ============================================

  await server.register(errorHandler);

  // ============================================
  // Routes
  // ============================================

  server.get('/', async () => ({
    name: 'meshwatch-server',
    version: VERSION,
    status: 'running',
    directory: pipeline.directory,
    files: '/api/files',
    events: '/events',
    health: '/health',
  }));

  await server.register(healthRoutes, { prefix: '/health', pipeline });
  await server.register(fileListRoutes, { prefix: '/api/files', pipeline });
  await server.register(contentRoutes, { prefix: '/content', pipeline });
  await server.register(eventRoutes, {
    prefix: '/events',
    pipeline,
    idleTimeoutMs: options.idleTimeoutMs ?? 0,
  });

  return server;
}
