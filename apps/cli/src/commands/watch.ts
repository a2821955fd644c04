/**
 * Watch Command
 *
 * Headless live viewer: follows the server's event stream, keeps the
 * scene list current and loads every OBJ file as it changes.
 */

import { emitKeypressEvents } from 'node:readline';
import chalk from 'chalk';
import type { ConnectionState } from '@meshwatch/core';
import { createLogger } from '@meshwatch/utils';
import { ViewerSession } from '@meshwatch/viewer';
import { loadClientConfig, type ClientFlags } from '../config/index.js';
import { actionForKey, formatKeyHelp, type KeyAction, type KeyPress } from '../lib/scene/keyBindings.js';
import { ObjSummaryRenderer, type ObjSummary } from '../lib/scene/objSummaryRenderer.js';
import { TerminalOverlay } from '../lib/scene/terminalOverlay.js';
import { formatState, printHeader, printInfo, printWarning } from '../lib/output.js';

export interface WatchOptions extends ClientFlags {
  keys?: boolean;
  helpKeys?: boolean;
}

export function applyKeyAction(
  action: KeyAction,
  session: ViewerSession<ObjSummary>,
  overlay: TerminalOverlay
): void {
  const scene = session.reconciler;
  switch (action) {
    case 'select-previous':
      scene.selectPrevious();
      break;
    case 'select-next':
      scene.selectNext();
      break;
    case 'deselect':
      scene.deselect();
      break;
    case 'toggle-visibility':
      scene.toggleVisibility();
      break;
    case 'show-all':
      scene.showAll();
      break;
    case 'reload':
      session.reload();
      break;
    case 'toggle-list':
      overlay.toggle(scene.views());
      break;
    case 'quit':
      session.quit();
      break;
    case 'close':
      session.close();
      break;
  }
}

export async function watchCommand(options: WatchOptions): Promise<void> {
  if (options.helpKeys) {
    printHeader('Keyboard controls');
    formatKeyHelp().forEach(line => console.log(line));
    console.log();
    return;
  }

  const config = loadClientConfig(process.env, options);
  const renderer = new ObjSummaryRenderer();
  const overlay = new TerminalOverlay(renderer);

  const session = new ViewerSession<ObjSummary>({
    baseUrl: config.serverUrl,
    renderer,
    overlay,
    backoff: { maxDelayMs: config.maxBackoffMs },
    onServerError: message => printWarning(`Server: ${message}`),
    onStateChange: (state: ConnectionState) => {
      console.log(chalk.gray('connection:'), formatState(state));
    },
    logger: createLogger({ component: 'cli-viewer' }),
  });

  session.supervisor.on('retry', (delay: number) => {
    printInfo(`Reconnecting in ${delay / 1000}s (press r to retry now)`);
  });

  printInfo(`Watching ${config.serverUrl}`);
  session.start();

  const interactive = options.keys !== false && process.stdin.isTTY;
  if (interactive) {
    emitKeypressEvents(process.stdin);
    process.stdin.setRawMode(true);
    process.stdin.on('keypress', (_chunk: string | undefined, key: KeyPress | undefined) => {
      const action = key ? actionForKey(key) : undefined;
      if (action) {
        applyKeyAction(action, session, overlay);
      }
    });
  }

  await new Promise<void>(resolve => {
    session.supervisor.on('state', (state: ConnectionState) => {
      if (state === 'draining') {
        resolve();
      }
    });
    process.once('SIGINT', () => session.close());
  });

  if (interactive) {
    process.stdin.setRawMode(false);
    process.stdin.pause();
  }
  printInfo('Viewer stopped');
}
