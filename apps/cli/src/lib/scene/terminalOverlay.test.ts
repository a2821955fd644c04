import { describe, it, expect, beforeEach } from 'vitest';
import type { SceneObjectView } from '@meshwatch/core';
import { ObjSummaryRenderer } from './objSummaryRenderer.js';
import { TerminalOverlay } from './terminalOverlay.js';

const view = (name: string, overrides: Partial<SceneObjectView> = {}): SceneObjectView => ({
  name,
  visible: true,
  selected: false,
  lastAppliedVersion: 1,
  loaded: false,
  ...overrides,
});

describe('TerminalOverlay', () => {
  let renderer: ObjSummaryRenderer;
  let output: string[];
  let overlay: TerminalOverlay;

  beforeEach(() => {
    renderer = new ObjSummaryRenderer();
    output = [];
    overlay = new TerminalOverlay(renderer, text => output.push(text));
  });

  it('prints one row per object with its load status', () => {
    renderer.attach('cube.obj', { vertices: 8, faces: 6, groups: 0 }, { visible: true, selected: true });

    overlay.update([
      view('cube.obj', { selected: true, loaded: true, lastAppliedVersion: 3 }),
      view('cone.obj', { visible: false }),
      view('bad.obj', { loadError: 'No vertices found' }),
    ]);

    expect(output).toEqual([
      [
        '> [x] cube.obj v3  8 vertices, 6 faces',
        '  [ ] cone.obj v1  loading',
        '  [x] bad.obj v1  error: No vertices found',
      ].join('\n'),
    ]);
  });

  it('does not reprint an unchanged list', () => {
    overlay.update([view('cone.obj')]);
    overlay.update([view('cone.obj')]);

    expect(output).toHaveLength(1);
  });

  it('stays quiet while hidden', () => {
    overlay.toggle([view('cone.obj')]);
    overlay.update([view('cone.obj', { lastAppliedVersion: 2 })]);
    expect(output).toEqual([]);

    overlay.toggle([view('cone.obj', { lastAppliedVersion: 2 })]);
    expect(output).toEqual(['  [x] cone.obj v2  loading']);
  });
});
