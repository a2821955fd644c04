#!/usr/bin/env node
/**
 * Server Entry Point
 *
 * Watches a scene directory and serves it live:
 * - GET /api/files, GET /content/:name
 * - WebSocket /events with the ordered change stream
 *
 * Fatal conditions: the listening socket cannot be bound (exit before
 * watching begins), or the watched directory is lost (exit code 1).
 */

import { Command, InvalidArgumentError } from 'commander';
import open from 'open';
import { BindError, MeshWatchError, type WatchLostError } from '@meshwatch/core';
import { SyncPipeline } from '@meshwatch/sync';
import { loadConfig, loadEnvFile, type CliOverrides, type ServerConfig } from './config/index.js';
import { createServerLogger } from './lib/logger.js';
import { createServer } from './server.js';

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

async function run(config: ServerConfig): Promise<void> {
  const logger = createServerLogger(config);
  let stopping = false;

  const pipeline = new SyncPipeline({
    directory: config.sceneDir,
    extensions: config.extensions,
    ignorePatterns: config.ignorePatterns,
    quietPeriodMs: config.debounceMs,
    queueCapacity: config.queueCapacity,
    digest: config.digest,
    onQuit: config.allowRemoteQuit
      ? (connection) => {
          logger.info({ connectionId: connection.id }, 'Quit requested by client');
          void shutdown('remote quit', 0);
        }
      : undefined,
    logger: logger.child({ component: 'sync-pipeline' }),
  });

  const server = await createServer({
    pipeline,
    logger,
    idleTimeoutMs: config.idleTimeoutMs,
  });

  async function shutdown(reason: string, exitCode: number): Promise<void> {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info({ reason }, 'Shutting down');

    pipeline.stop(reason === 'remote quit' ? 'Server quit by client' : 'Server shutting down');
    try {
      await server.close();
      logger.info('Server closed gracefully');
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      exitCode = 1;
    }
    process.exit(exitCode);
  }

  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  for (const signal of signals) {
    process.on(signal, () => {
      logger.info({ signal }, 'Received shutdown signal');
      void shutdown(signal, 0);
    });
  }

  try {
    await server.listen({ host: config.host, port: config.port });
  } catch (err) {
    throw new BindError(config.host, config.port, err);
  }

  pipeline.on('lost', (error: WatchLostError) => {
    logger.fatal({ err: error }, 'Scene directory lost; exiting');
    void shutdown('watch lost', 1);
  });
  await pipeline.start();

  const url = `http://${config.host.includes(':') ? `[${config.host}]` : config.host}:${config.port}`;
  logger.info({
    url,
    directory: config.sceneDir,
    files: pipeline.sequencer.fileCount,
    env: config.nodeEnv,
  }, 'Server started');

  if (config.open) {
    await open(url);
  }
}

const program = new Command();

program
  .name('meshwatch-server')
  .description('Watch a directory of mesh files and serve it to live viewers')
  .version('0.1.0')
  .option('-p, --port <port>', 'Port to listen on (default 8080)', parseInteger)
  .option('--host <host>', 'Address to bind (default 127.0.0.1)')
  .option('-s, --scene-dir <path>', 'Directory to watch (default ./scene)')
  .option('-o, --open', 'Open the server URL in a browser once started')
  .option('--debounce <ms>', 'Quiet period before a change is reported', parseInteger)
  .action(async (options: CliOverrides) => {
    loadEnvFile();
    const config = loadConfig(process.env, options);
    await run(config);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof MeshWatchError) {
    console.error(err.message);
  } else {
    console.error('Failed to start server:', err);
  }
  process.exit(1);
});
