/**
 * Files Command
 *
 * List the files the server currently tracks.
 */

import ora from 'ora';
import { ContentClient } from '@meshwatch/viewer';
import { loadClientConfig, type ClientFlags } from '../config/index.js';
import { printHeader, printJson, printTable } from '../lib/output.js';

export interface FilesOptions extends ClientFlags {
  json?: boolean;
}

export async function filesCommand(options: FilesOptions): Promise<void> {
  const config = loadClientConfig(process.env, options);
  const client = new ContentClient(config.serverUrl);
  const spinner = ora('Fetching file list...').start();

  try {
    const response = await client.listFiles();
    spinner.stop();

    if (options.json) {
      printJson(response);
      return;
    }

    printHeader(`${response.count} file${response.count === 1 ? '' : 's'} on ${config.serverUrl}`);
    printTable(response.files.map(file => ({
      name: file.name,
      version: file.version,
      size: file.size,
      modified: new Date(file.mtime).toLocaleString(),
    })));
  } catch (error) {
    spinner.fail('Could not fetch the file list');
    throw error;
  }
}
