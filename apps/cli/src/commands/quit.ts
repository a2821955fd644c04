/**
 * Quit Command
 *
 * Connect once and ask the server to shut down.
 */

import ora from 'ora';
import { MeshWatchError, type ConnectionState } from '@meshwatch/core';
import { createLogger } from '@meshwatch/utils';
import { ReconnectSupervisor, createWebSocketChannel, eventsUrl } from '@meshwatch/viewer';
import { loadClientConfig, type ClientFlags } from '../config/index.js';

export interface QuitOptions extends ClientFlags {
  timeout?: number;
}

export async function quitCommand(options: QuitOptions): Promise<void> {
  const config = loadClientConfig(process.env, options);
  const timeoutMs = options.timeout ?? 5000;
  const spinner = ora(`Asking ${config.serverUrl} to shut down...`).start();

  const supervisor = new ReconnectSupervisor({
    connect: createWebSocketChannel(eventsUrl(config.serverUrl)),
    pingIntervalMs: 0,
    logger: createLogger({ component: 'cli-quit' }),
  });

  try {
    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new MeshWatchError(`Server did not answer within ${timeoutMs}ms`, 'CONNECT_TIMEOUT', 504));
      }, timeoutMs);

      supervisor.on('state', (state: ConnectionState) => {
        if (state === 'connected') {
          clearTimeout(timer);
          resolve();
        }
      });
      supervisor.start();
    });

    supervisor.shutdown({ notifyServer: true });
    spinner.succeed('Shutdown requested');
  } catch (error) {
    supervisor.shutdown();
    spinner.fail('Could not reach the server');
    throw error;
  }
}
