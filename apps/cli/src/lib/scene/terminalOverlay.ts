/**
 * Terminal overlay: prints the scene list whenever it changes
 */

import chalk from 'chalk';
import type { SceneObjectView } from '@meshwatch/core';
import type { SceneOverlay } from '@meshwatch/viewer';
import { formatSceneRow, printError } from '../output.js';
import { formatSummary, type ObjSummaryRenderer } from './objSummaryRenderer.js';

export class TerminalOverlay implements SceneOverlay {
  private readonly renderer: ObjSummaryRenderer;
  private readonly write: (text: string) => void;
  private last = '';
  hidden = false;

  constructor(renderer: ObjSummaryRenderer, write: (text: string) => void = text => console.log(text)) {
    this.renderer = renderer;
    this.write = write;
  }

  update(views: SceneObjectView[]): void {
    const text = this.render(views);
    // Identical lists are not reprinted
    if (this.hidden || text === this.last) {
      return;
    }
    this.last = text;
    this.write(text);
  }

  reportError(name: string, message: string): void {
    printError(`${name}: ${message}`);
  }

  toggle(views: SceneObjectView[]): void {
    this.hidden = !this.hidden;
    this.last = '';
    this.update(views);
  }

  render(views: SceneObjectView[]): string {
    if (views.length === 0) {
      return chalk.gray('(no files)');
    }
    return views
      .map(view => {
        const mesh = this.renderer.get(view.name);
        return formatSceneRow(view, mesh ? formatSummary(mesh.summary) : undefined);
      })
      .join('\n');
  }
}
