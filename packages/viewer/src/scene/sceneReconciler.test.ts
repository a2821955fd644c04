import { describe, it, expect, beforeEach } from 'vitest';
import type { SceneObjectView, SyncMessage } from '@meshwatch/core';
import { logger } from '@meshwatch/utils';
import {
  SceneReconciler,
  type ContentFetcher,
  type LoadResult,
  type MeshRenderer,
  type RenderFlags,
  type SceneOverlay,
} from './sceneReconciler.js';

class FakeRenderer implements MeshRenderer<string> {
  attached: Array<{ name: string; renderable: string; flags: RenderFlags }> = [];
  unloaded: string[] = [];
  flagUpdates: Array<{ name: string; flags: RenderFlags }> = [];

  load(_name: string, bytes: Uint8Array): LoadResult<string> {
    const text = new TextDecoder().decode(bytes);
    if (text === 'broken') {
      return { ok: false, error: 'No vertices found' };
    }
    return { ok: true, renderable: text };
  }

  attach(name: string, renderable: string, flags: RenderFlags): void {
    this.attached.push({ name, renderable, flags });
  }

  unload(name: string): void {
    this.unloaded.push(name);
  }

  setFlags(name: string, flags: RenderFlags): void {
    this.flagUpdates.push({ name, flags });
  }
}

class FakeOverlay implements SceneOverlay {
  updates: SceneObjectView[][] = [];
  errors: Array<{ name: string; message: string }> = [];

  update(views: SceneObjectView[]): void {
    this.updates.push(views);
  }

  reportError(name: string, message: string): void {
    this.errors.push({ name, message });
  }
}

class FakeContent {
  files = new Map<string, string>();
  requests: string[] = [];

  fetch: ContentFetcher = async (name) => {
    this.requests.push(name);
    const text = this.files.get(name);
    if (text === undefined) {
      throw new Error(`File not found: ${name}`);
    }
    return new TextEncoder().encode(text);
  };
}

const resync = (epoch: string, files: Array<[string, number]>): SyncMessage => ({
  type: 'resync_all',
  epoch,
  files: files.map(([name, version]) => ({ name, mtime: 1000 + version, size: 10, version })),
});

const added = (name: string, version: number): SyncMessage => ({
  type: 'added',
  name,
  mtime: 1000 + version,
  size: 10,
  version,
});

const modified = (name: string, version: number): SyncMessage => ({
  type: 'modified',
  name,
  mtime: 1000 + version,
  size: 10,
  version,
});

const removed = (name: string, version: number): SyncMessage => ({ type: 'removed', name, version });

describe('SceneReconciler', () => {
  let renderer: FakeRenderer;
  let overlay: FakeOverlay;
  let content: FakeContent;
  let scene: SceneReconciler<string>;

  beforeEach(() => {
    renderer = new FakeRenderer();
    overlay = new FakeOverlay();
    content = new FakeContent();
    scene = new SceneReconciler({ renderer, overlay, fetchContent: content.fetch, logger });
  });

  describe('resync_all', () => {
    it('creates every listed object visible and unselected, then loads content', async () => {
      content.files.set('a.obj', 'mesh a');
      content.files.set('b.obj', 'mesh b');

      expect(scene.apply(resync('e1', [['b.obj', 2], ['a.obj', 1]]))).toBe(true);
      expect(scene.names()).toEqual(['a.obj', 'b.obj']);
      expect(scene.get('a.obj')).toEqual({
        name: 'a.obj',
        visible: true,
        selected: false,
        lastAppliedVersion: 1,
        loaded: false,
      });
      expect(scene.pendingFetches).toBe(2);

      await scene.idle();

      expect(scene.pendingFetches).toBe(0);
      expect(renderer.attached.map(call => [call.name, call.renderable])).toEqual([
        ['b.obj', 'mesh b'],
        ['a.obj', 'mesh a'],
      ]);
      expect(scene.get('a.obj')?.loaded).toBe(true);
    });

    it('converges to the snapshot regardless of prior state', async () => {
      content.files.set('a.obj', 'a');
      content.files.set('b.obj', 'b');
      content.files.set('c.obj', 'c');
      scene.apply(resync('e1', [['a.obj', 1], ['b.obj', 2]]));
      await scene.idle();
      scene.select('a.obj');

      scene.apply(resync('e1', [['b.obj', 5], ['c.obj', 1]]));
      await scene.idle();

      expect(scene.names()).toEqual(['b.obj', 'c.obj']);
      expect(scene.get('b.obj')?.lastAppliedVersion).toBe(5);
      expect(scene.get('c.obj')?.lastAppliedVersion).toBe(1);
      expect(renderer.unloaded).toEqual(['a.obj']);
      expect(scene.selected()).toBeUndefined();
    });

    it('does not refetch content that is already current', async () => {
      content.files.set('a.obj', 'a');
      scene.apply(resync('e1', [['a.obj', 3]]));
      await scene.idle();

      scene.apply(resync('e1', [['a.obj', 3]]));
      await scene.idle();

      expect(content.requests).toEqual(['a.obj']);
    });

    it('brings a client that missed events to the same state as one that saw them all', async () => {
      content.files.set('a.obj', 'a');
      content.files.set('b.obj', 'b');
      content.files.set('c.obj', 'c');
      const behind = new SceneReconciler({ renderer: new FakeRenderer(), fetchContent: content.fetch, logger });

      const stream = [
        resync('e1', []),
        added('a.obj', 1),
        added('b.obj', 1),
        modified('a.obj', 2),
        removed('b.obj', 2),
        added('c.obj', 1),
        modified('c.obj', 2),
      ];
      stream.forEach(message => scene.apply(message));
      // The lagging client sees the first two frames, then a snapshot
      stream.slice(0, 2).forEach(message => behind.apply(message));
      behind.apply(resync('e1', [['a.obj', 2], ['c.obj', 2]]));

      scene.apply(modified('a.obj', 3));
      behind.apply(modified('a.obj', 3));
      await Promise.all([scene.idle(), behind.idle()]);

      const versions = (reconciler: SceneReconciler<string>) =>
        reconciler.names().map(name => [name, reconciler.get(name)?.lastAppliedVersion, reconciler.get(name)?.loaded]);
      expect(behind.names()).toEqual(['a.obj', 'c.obj']);
      expect(versions(behind)).toEqual(versions(scene));
      expect(versions(scene)).toEqual([['a.obj', 3, true], ['c.obj', 2, true]]);
    });

    it('clears remembered removals on every snapshot', () => {
      scene.apply(resync('e1', []));
      expect(scene.apply(removed('ghost.obj', 4))).toBe(false);
      expect(scene.apply(added('ghost.obj', 3))).toBe(false);

      scene.apply(resync('e1', []));
      expect(scene.apply(added('ghost.obj', 3))).toBe(true);
    });

    it('resets version tracking when the server epoch changes', async () => {
      content.files.set('a.obj', 'first run');
      scene.apply(resync('e1', [['a.obj', 7]]));
      await scene.idle();

      content.files.set('a.obj', 'second run');
      scene.apply(resync('e2', [['a.obj', 1]]));
      await scene.idle();

      expect(scene.currentEpoch).toBe('e2');
      expect(scene.get('a.obj')?.lastAppliedVersion).toBe(1);
      expect(renderer.attached.map(call => call.renderable)).toEqual(['first run', 'second run']);
      expect(scene.apply(modified('a.obj', 2))).toBe(true);
    });
  });

  describe('per-file events', () => {
    beforeEach(() => {
      scene.apply(resync('e1', []));
      content.files.set('cube.obj', 'cube');
    });

    it('is idempotent for a repeated event', async () => {
      expect(scene.apply(added('cube.obj', 1))).toBe(true);
      expect(scene.apply(added('cube.obj', 1))).toBe(false);
      await scene.idle();

      expect(content.requests).toEqual(['cube.obj']);
      expect(renderer.attached).toHaveLength(1);
    });

    it('never moves lastAppliedVersion backwards', () => {
      scene.apply(added('cube.obj', 1));
      scene.apply(modified('cube.obj', 3));

      expect(scene.apply(modified('cube.obj', 2))).toBe(false);
      expect(scene.get('cube.obj')?.lastAppliedVersion).toBe(3);
    });

    it('creates an object for a modified event about an unknown name', () => {
      expect(scene.apply(modified('cube.obj', 4))).toBe(true);
      expect(scene.get('cube.obj')?.lastAppliedVersion).toBe(4);
    });

    it('unloads exactly once when a file is added then removed', async () => {
      scene.apply(added('cube.obj', 1));
      await scene.idle();
      scene.apply(removed('cube.obj', 2));
      scene.apply(removed('cube.obj', 2));

      expect(renderer.unloaded).toEqual(['cube.obj']);
      expect(scene.names()).toEqual([]);
    });

    it('discards a stale added after a removal', () => {
      scene.apply(added('cube.obj', 1));
      scene.apply(removed('cube.obj', 2));

      expect(scene.apply(added('cube.obj', 1))).toBe(false);
      expect(scene.apply(added('cube.obj', 3))).toBe(true);
      expect(scene.get('cube.obj')?.lastAppliedVersion).toBe(3);
    });

    it('remembers removals of names it never saw', () => {
      expect(scene.apply(removed('ghost.obj', 4))).toBe(false);
      expect(scene.apply(added('ghost.obj', 3))).toBe(false);
      expect(scene.names()).toEqual([]);
    });

    it('ignores a fetch that completes after its object was removed', async () => {
      scene.apply(added('cube.obj', 1));
      scene.apply(removed('cube.obj', 2));
      await scene.idle();

      expect(renderer.attached).toEqual([]);
      expect(renderer.unloaded).toEqual(['cube.obj']);
    });
  });

  describe('content loading', () => {
    beforeEach(() => {
      scene.apply(resync('e1', []));
    });

    it('keeps the previous representation when a reload fails', async () => {
      content.files.set('cube.obj', 'good');
      scene.apply(added('cube.obj', 1));
      await scene.idle();

      content.files.set('cube.obj', 'broken');
      scene.apply(modified('cube.obj', 2));
      await scene.idle();

      expect(renderer.attached).toHaveLength(1);
      expect(renderer.unloaded).toEqual([]);
      expect(scene.get('cube.obj')).toEqual({
        name: 'cube.obj',
        visible: true,
        selected: false,
        lastAppliedVersion: 2,
        loadError: 'No vertices found',
        loaded: true,
      });
      expect(overlay.errors).toEqual([{ name: 'cube.obj', message: 'No vertices found' }]);

      content.files.set('cube.obj', 'fixed');
      scene.apply(modified('cube.obj', 3));
      await scene.idle();

      expect(renderer.attached.map(call => call.renderable)).toEqual(['good', 'fixed']);
      expect(scene.get('cube.obj')?.loadError).toBeUndefined();
    });

    it('reports fetch failures as load errors', async () => {
      scene.apply(added('missing.obj', 1));
      await scene.idle();

      expect(scene.get('missing.obj')?.loadError).toBe('File not found: missing.obj');
      expect(scene.get('missing.obj')?.loaded).toBe(false);
    });

    it('aborts an older fetch when a newer version arrives', async () => {
      const pending: Array<{ signal: AbortSignal; resolve: (bytes: Uint8Array) => void }> = [];
      const slow = new SceneReconciler<string>({
        renderer,
        logger,
        fetchContent: (_name, signal) =>
          new Promise(resolve => {
            pending.push({ signal, resolve });
          }),
      });
      slow.apply(resync('e1', []));

      slow.apply(added('cube.obj', 1));
      slow.apply(modified('cube.obj', 2));

      expect(pending).toHaveLength(2);
      expect(pending[0]?.signal.aborted).toBe(true);
      expect(pending[1]?.signal.aborted).toBe(false);
      expect(slow.pendingFetches).toBe(1);

      pending[1]?.resolve(new TextEncoder().encode('version 2'));
      pending[0]?.resolve(new TextEncoder().encode('version 1'));
      await slow.idle();

      expect(renderer.attached.map(call => call.renderable)).toEqual(['version 2']);
    });

    it('reattaches with the current flags', async () => {
      content.files.set('cube.obj', 'one');
      scene.apply(added('cube.obj', 1));
      await scene.idle();

      scene.select('cube.obj');
      scene.toggleVisibility();
      content.files.set('cube.obj', 'two');
      scene.apply(modified('cube.obj', 2));
      await scene.idle();

      expect(renderer.attached[1]).toEqual({
        name: 'cube.obj',
        renderable: 'two',
        flags: { visible: false, selected: true },
      });
    });

    it('reloadAll refetches every object', async () => {
      content.files.set('a.obj', 'a');
      content.files.set('b.obj', 'b');
      scene.apply(added('a.obj', 1));
      scene.apply(added('b.obj', 2));
      await scene.idle();

      scene.reloadAll();
      await scene.idle();

      expect(content.requests).toEqual(['a.obj', 'b.obj', 'a.obj', 'b.obj']);
      expect(renderer.attached).toHaveLength(4);
    });
  });

  describe('user actions', () => {
    beforeEach(async () => {
      for (const name of ['a.obj', 'b.obj', 'c.obj']) {
        content.files.set(name, name);
      }
      scene.apply(resync('e1', [['b.obj', 1], ['c.obj', 2], ['a.obj', 3]]));
      await scene.idle();
    });

    it('selectNext starts from the last name and wraps', () => {
      expect(scene.selectNext()).toBe('c.obj');
      expect(scene.selectNext()).toBe('a.obj');
      expect(scene.selectNext()).toBe('b.obj');
      expect(scene.selected()).toBe('b.obj');
    });

    it('selectPrevious starts from the first name and wraps', () => {
      expect(scene.selectPrevious()).toBe('a.obj');
      expect(scene.selectPrevious()).toBe('c.obj');
    });

    it('keeps at most one object selected', () => {
      scene.select('a.obj');
      scene.select('b.obj');

      expect(scene.views().filter(view => view.selected).map(view => view.name)).toEqual(['b.obj']);
      expect(renderer.flagUpdates).toEqual([
        { name: 'a.obj', flags: { visible: true, selected: true } },
        { name: 'a.obj', flags: { visible: true, selected: false } },
        { name: 'b.obj', flags: { visible: true, selected: true } },
      ]);
    });

    it('deselect clears the selection', () => {
      scene.select('a.obj');
      scene.deselect();
      expect(scene.selected()).toBeUndefined();
    });

    it('select ignores unknown names', () => {
      expect(scene.select('nope.obj')).toBe(false);
      expect(scene.selected()).toBeUndefined();
    });

    it('toggles visibility of the selected object only', () => {
      expect(scene.toggleVisibility()).toBe(false);

      scene.select('b.obj');
      expect(scene.toggleVisibility()).toBe(true);
      expect(scene.views().map(view => view.visible)).toEqual([true, false, true]);
    });

    it('showAll makes every object visible', () => {
      scene.toggleVisibility('a.obj');
      scene.toggleVisibility('c.obj');
      scene.showAll();

      expect(scene.views().every(view => view.visible)).toBe(true);
    });

    it('clears the selection when the selected object is removed', () => {
      scene.select('c.obj');
      scene.apply(removed('c.obj', 4));

      expect(scene.selected()).toBeUndefined();
      expect(scene.selectNext()).toBe('b.obj');
    });

    it('pushes sorted views to the overlay after each change', () => {
      overlay.updates = [];
      scene.select('a.obj');

      expect(overlay.updates).toHaveLength(1);
      expect(overlay.updates[0]?.map(view => view.name)).toEqual(['a.obj', 'b.obj', 'c.obj']);
    });
  });
});
