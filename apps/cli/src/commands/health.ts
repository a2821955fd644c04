/**
 * Health Command
 *
 * Check whether the server is watching and serving.
 */

import ora from 'ora';
import chalk from 'chalk';
import { ContentClient } from '@meshwatch/viewer';
import { formatDuration } from '@meshwatch/utils';
import { loadClientConfig, type ClientFlags } from '../config/index.js';
import { printHeader, printKeyValue, printSuccess, printWarning } from '../lib/output.js';

export async function healthCommand(options: ClientFlags): Promise<void> {
  const config = loadClientConfig(process.env, options);
  const client = new ContentClient(config.serverUrl);
  const spinner = ora('Checking server health...').start();

  try {
    const report = await client.readiness();
    spinner.stop();

    const color = report.status === 'ready' ? chalk.green : chalk.yellow;
    printHeader(`Server: ${color(report.status.toUpperCase())}`);

    printKeyValue('URL', config.serverUrl);
    printKeyValue('Uptime', formatDuration(Math.round(report.uptime * 1000)));
    printKeyValue('Files', report.files);
    printKeyValue('Viewers', report.connections);
    printKeyValue('Watcher', report.checks.watcher ? 'running' : 'stopped');
    printKeyValue('Initial scan', report.checks.initialScan ? 'complete' : 'pending');
    console.log();

    if (report.status === 'ready') {
      printSuccess('Server is watching and serving');
    } else {
      printWarning('Server is still starting');
    }
  } catch (error) {
    spinner.fail('Server is not reachable');
    throw error;
  }
}
