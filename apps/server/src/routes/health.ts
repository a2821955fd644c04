/**
 * Health Routes
 *
 * Liveness and readiness probes.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { ReadinessResponse } from '@meshwatch/core';
import type { SyncRouteOptions } from './files.js';

export const healthRoutes: FastifyPluginAsync<SyncRouteOptions> = async (fastify, { pipeline }) => {
  // Liveness: 200 whenever the process is serving
  fastify.get('/', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
  }));

  // Readiness: watching and past the initial scan
  fastify.get('/ready', async (_request, reply) => {
    const checks = {
      watcher: pipeline.watcher.running,
      initialScan: pipeline.sequencer.ready,
    };
    const ready = checks.watcher && checks.initialScan;

    const status: ReadinessResponse = {
      status: ready ? 'ready' : 'starting',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      checks,
      files: pipeline.sequencer.fileCount,
      connections: pipeline.hub.size,
      epoch: pipeline.sequencer.epoch,
    };

    return reply.status(ready ? 200 : 503).send(status);
  });
};
