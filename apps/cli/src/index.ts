#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Terminal client for a meshwatch server. Talks to it only over HTTP and
 * the /events WebSocket.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { MeshWatchError } from '@meshwatch/core';

import { watchCommand } from './commands/watch.js';
import { filesCommand } from './commands/files.js';
import { healthCommand } from './commands/health.js';
import { quitCommand } from './commands/quit.js';
import { printError } from './lib/output.js';

function parseMilliseconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Not a positive number of milliseconds.');
  }
  return parsed;
}

const program = new Command();

program
  .name('meshwatch')
  .description('Live terminal viewer for a meshwatch server')
  .version('0.1.0');

program
  .command('watch', { isDefault: true })
  .description('Follow the server and keep a live scene of its files')
  .option('-u, --url <url>', 'Server URL (default $MESHWATCH_URL or http://127.0.0.1:8080)')
  .option('--backoff-max <ms>', 'Longest delay between reconnect attempts', parseMilliseconds)
  .option('--no-keys', 'Disable keyboard controls')
  .option('--help-keys', 'List the keyboard controls and exit')
  .action(watchCommand);

program
  .command('files')
  .description('List the files the server tracks')
  .option('-u, --url <url>', 'Server URL')
  .option('--json', 'Output in JSON format')
  .action(filesCommand);

program
  .command('health')
  .description('Check server readiness')
  .option('-u, --url <url>', 'Server URL')
  .action(healthCommand);

program
  .command('quit')
  .description('Ask the server to shut down')
  .option('-u, --url <url>', 'Server URL')
  .option('-t, --timeout <ms>', 'How long to wait for a connection', parseMilliseconds)
  .action(quitCommand);

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof MeshWatchError) {
    printError(err.message);
  } else if (err instanceof Error) {
    printError(err.message);
    console.log('Is the server running? Start it with', chalk.cyan('meshwatch-server'));
  } else {
    printError(String(err));
  }
  process.exit(1);
});
