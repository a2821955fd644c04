/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import type { ConnectionState, SceneObjectView } from '@meshwatch/core';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printTable(data: Record<string, unknown>[]): void {
  if (data.length === 0) {
    printInfo('No files to display');
    return;
  }
  console.table(data);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

const stateColors: Record<ConnectionState, (text: string) => string> = {
  connected: chalk.green,
  connecting: chalk.yellow,
  disconnected: chalk.red,
  draining: chalk.gray,
};

export function formatState(state: ConnectionState): string {
  return stateColors[state](state);
}

/**
 * One line of the scene list, e.g. "> [x] cube.obj v3"
 */
export function formatSceneRow(view: SceneObjectView, detail?: string): string {
  const marker = view.selected ? '>' : ' ';
  const visibility = view.visible ? '[x]' : '[ ]';
  const status = view.loadError
    ? `error: ${view.loadError}`
    : view.loaded ? (detail ?? 'loaded') : 'loading';
  return `${marker} ${visibility} ${view.name} v${view.lastAppliedVersion}  ${status}`;
}

export function printKeyValue(key: string, value: string | number): void {
  console.log(`  ${chalk.gray(key + ':')} ${value}`);
}
