/**
 * Scene Reconciler
 *
 * Applies the server's event stream to the local scene replica: which
 * objects exist, which are visible or selected, and which version of
 * each was last applied.
 *
 * apply() is synchronous and never waits on I/O. Content is fetched in
 * the background, one fetch per name at a time; a newer request aborts
 * the older one, and a completion that is no longer current is discarded.
 * A failed fetch or parse keeps the previous representation on screen.
 */

import { EventEmitter } from 'node:events';
import type {
  FileChangedMessage,
  FileRemovedMessage,
  ResyncAllMessage,
  SceneObjectState,
  SceneObjectView,
  SyncMessage,
} from '@meshwatch/core';
import { createLogger, type Logger } from '@meshwatch/utils';

export interface RenderFlags {
  visible: boolean;
  selected: boolean;
}

export type LoadResult<R> =
  | { ok: true; renderable: R }
  | { ok: false; error: string };

/**
 * Mesh parsing and drawing live behind this interface
 */
export interface MeshRenderer<R> {
  /** Parse raw file bytes into something attachable */
  load(name: string, bytes: Uint8Array): LoadResult<R> | Promise<LoadResult<R>>;
  /** Show `renderable` for `name`, replacing any previous representation */
  attach(name: string, renderable: R, flags: RenderFlags): void;
  unload(name: string): void;
  setFlags(name: string, flags: RenderFlags): void;
}

export interface SceneOverlay {
  update(views: SceneObjectView[]): void;
  reportError(name: string, message: string): void;
}

export type ContentFetcher = (name: string, signal: AbortSignal) => Promise<Uint8Array>;

export interface SceneReconcilerOptions<R> {
  renderer: MeshRenderer<R>;
  fetchContent: ContentFetcher;
  overlay?: SceneOverlay;
  logger?: Logger;
}

interface PendingFetch {
  version: number;
  controller: AbortController;
}

interface SceneObject {
  state: SceneObjectState;
  loaded: boolean;
  // Version whose content is currently attached; 0 when none
  loadedVersion: number;
  fetch: PendingFetch | null;
}

/**
 * Events:
 * - 'loaded'  (name, version)
 * - 'failed'  (name, message)
 */
export class SceneReconciler<R> extends EventEmitter {
  private readonly renderer: MeshRenderer<R>;
  private readonly fetchContent: ContentFetcher;
  private readonly overlay?: SceneOverlay;
  private readonly logger: Logger;
  private objects: Map<string, SceneObject> = new Map();
  // Highest removed version per name no longer in the scene. Every
  // resync_all starts them afresh, since later frames on a connection were
  // produced after its snapshot; they only cover removals since then.
  private tombstones: Map<string, number> = new Map();
  private inFlight: Set<Promise<void>> = new Set();
  private epoch: string | null = null;

  constructor(options: SceneReconcilerOptions<R>) {
    super();
    this.renderer = options.renderer;
    this.fetchContent = options.fetchContent;
    this.overlay = options.overlay;
    this.logger = options.logger ?? createLogger({ component: 'scene-reconciler' });
  }

  /**
   * Apply one server message. Returns false when it was discarded as stale.
   */
  apply(message: SyncMessage): boolean {
    const applied = this.dispatch(message);
    if (applied) {
      this.publish();
    } else {
      this.logger.debug({ type: message.type }, 'Discarded stale message');
    }
    return applied;
  }

  // ============================================
  // User actions
  // ============================================

  select(name: string): boolean {
    const object = this.objects.get(name);
    if (!object) {
      return false;
    }
    const current = this.selected();
    if (current === name) {
      return true;
    }
    if (current !== undefined) {
      this.setSelected(current, false);
    }
    this.setSelected(name, true);
    this.publish();
    return true;
  }

  deselect(): void {
    const current = this.selected();
    if (current === undefined) {
      return;
    }
    this.setSelected(current, false);
    this.publish();
  }

  /**
   * Move the selection forward through names in ascending order, wrapping.
   * With nothing selected, the last name is chosen.
   */
  selectNext(): string | undefined {
    const names = this.names();
    if (names.length === 0) {
      return undefined;
    }
    const current = this.selected();
    const index = current === undefined ? -1 : names.indexOf(current);
    const next = index === -1 ? names[names.length - 1] : names[(index + 1) % names.length];
    if (next !== undefined) {
      this.select(next);
    }
    return next;
  }

  /**
   * Move the selection backward, wrapping. With nothing selected, the
   * first name is chosen.
   */
  selectPrevious(): string | undefined {
    const names = this.names();
    if (names.length === 0) {
      return undefined;
    }
    const current = this.selected();
    const index = current === undefined ? -1 : names.indexOf(current);
    const previous = index === -1 ? names[0] : names[(index - 1 + names.length) % names.length];
    if (previous !== undefined) {
      this.select(previous);
    }
    return previous;
  }

  /**
   * Flip visibility of the selected object (or `name` when given)
   */
  toggleVisibility(name: string | undefined = this.selected()): boolean {
    const object = name === undefined ? undefined : this.objects.get(name);
    if (!object || name === undefined) {
      return false;
    }
    object.state.visible = !object.state.visible;
    this.pushFlags(name, object);
    this.publish();
    return true;
  }

  showAll(): void {
    for (const [name, object] of this.objects) {
      if (!object.state.visible) {
        object.state.visible = true;
        this.pushFlags(name, object);
      }
    }
    this.publish();
  }

  /**
   * Refetch the content of every object
   */
  reloadAll(): void {
    for (const [name, object] of this.objects) {
      this.startFetch(name, object, object.state.lastAppliedVersion);
    }
  }

  // ============================================
  // Queries
  // ============================================

  get(name: string): SceneObjectView | undefined {
    const object = this.objects.get(name);
    return object ? toView(name, object) : undefined;
  }

  names(): string[] {
    return Array.from(this.objects.keys()).sort();
  }

  views(): SceneObjectView[] {
    return this.names().flatMap(name => {
      const view = this.get(name);
      return view ? [view] : [];
    });
  }

  selected(): string | undefined {
    for (const [name, object] of this.objects) {
      if (object.state.selected) {
        return name;
      }
    }
    return undefined;
  }

  get pendingFetches(): number {
    let count = 0;
    for (const object of this.objects.values()) {
      if (object.fetch) {
        count++;
      }
    }
    return count;
  }

  get currentEpoch(): string | null {
    return this.epoch;
  }

  /**
   * Resolves once every fetch started so far has completed
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled(Array.from(this.inFlight));
    }
  }

  /**
   * Abort every pending fetch
   */
  dispose(): void {
    for (const object of this.objects.values()) {
      object.fetch?.controller.abort();
      object.fetch = null;
    }
  }

  // ============================================
  // Message handling
  // ============================================

  private dispatch(message: SyncMessage): boolean {
    switch (message.type) {
      case 'added':
      case 'modified':
        return this.applyChange(message);
      case 'removed':
        return this.applyRemove(message);
      case 'resync_all':
        this.applyResync(message);
        return true;
    }
  }

  private applyChange(message: FileChangedMessage): boolean {
    const { name, version } = message;
    let object = this.objects.get(name);

    if (!object) {
      const removedAt = this.tombstones.get(name);
      if (removedAt !== undefined && version <= removedAt) {
        return false;
      }
      this.tombstones.delete(name);
      object = createObject(version);
      this.objects.set(name, object);
    } else if (version <= object.state.lastAppliedVersion) {
      return false;
    } else {
      object.state.lastAppliedVersion = version;
    }

    this.startFetch(name, object, version);
    return true;
  }

  private applyRemove(message: FileRemovedMessage): boolean {
    const { name, version } = message;
    const object = this.objects.get(name);

    if (!object) {
      const removedAt = this.tombstones.get(name) ?? 0;
      this.tombstones.set(name, Math.max(removedAt, version));
      return false;
    }
    if (version <= object.state.lastAppliedVersion) {
      return false;
    }

    this.removeObject(name, object, version);
    return true;
  }

  private applyResync(message: ResyncAllMessage): void {
    if (message.epoch !== this.epoch) {
      if (this.epoch !== null) {
        this.logger.info({ from: this.epoch, to: message.epoch }, 'Server restarted, resetting versions');
        // Versions from the previous server run are meaningless now
        for (const object of this.objects.values()) {
          object.state.lastAppliedVersion = 0;
          object.loadedVersion = 0;
        }
      }
      this.epoch = message.epoch;
    }
    this.tombstones.clear();

    const present = new Set(message.files.map(file => file.name));
    for (const [name, object] of Array.from(this.objects)) {
      if (!present.has(name)) {
        this.removeObject(name, object, object.state.lastAppliedVersion);
      }
    }

    for (const file of message.files) {
      let object = this.objects.get(file.name);
      if (!object) {
        this.tombstones.delete(file.name);
        object = createObject(file.version);
        this.objects.set(file.name, object);
      } else if (file.version > object.state.lastAppliedVersion) {
        object.state.lastAppliedVersion = file.version;
      }

      const wanted = object.state.lastAppliedVersion;
      if (object.loadedVersion !== wanted && object.fetch?.version !== wanted) {
        this.startFetch(file.name, object, wanted);
      }
    }
  }

  private removeObject(name: string, object: SceneObject, version: number): void {
    object.fetch?.controller.abort();
    object.fetch = null;
    this.objects.delete(name);
    this.tombstones.set(name, version);
    this.renderer.unload(name);
  }

  // ============================================
  // Content fetching
  // ============================================

  private startFetch(name: string, object: SceneObject, version: number): void {
    object.fetch?.controller.abort();

    const pending: PendingFetch = {
      version,
      controller: new AbortController(),
    };
    object.fetch = pending;

    const work = this.runFetch(name, pending).catch((error: unknown) => {
      this.logger.error({ err: error, name }, 'Content fetch handler failed');
    });
    this.inFlight.add(work);
    void work.finally(() => this.inFlight.delete(work));
  }

  private async runFetch(name: string, pending: PendingFetch): Promise<void> {
    let outcome: LoadResult<R>;
    try {
      const bytes = await this.fetchContent(name, pending.controller.signal);
      if (!this.isCurrent(name, pending)) {
        return;
      }
      outcome = await this.renderer.load(name, bytes);
    } catch (error) {
      if (!this.isCurrent(name, pending)) {
        return;
      }
      outcome = { ok: false, error: error instanceof Error ? error.message : String(error) };
    }

    this.completeFetch(name, pending, outcome);
  }

  private completeFetch(name: string, pending: PendingFetch, outcome: LoadResult<R>): void {
    const object = this.objects.get(name);
    if (!object || object.fetch !== pending) {
      return;
    }
    object.fetch = null;

    if (outcome.ok) {
      this.renderer.attach(name, outcome.renderable, flagsOf(object));
      object.loaded = true;
      object.loadedVersion = pending.version;
      delete object.state.loadError;
      this.logger.debug({ name, version: pending.version }, 'Content attached');
      this.emit('loaded', name, pending.version);
    } else {
      object.state.loadError = outcome.error;
      this.logger.warn({ name, version: pending.version, error: outcome.error }, 'Content failed to load');
      this.overlay?.reportError(name, outcome.error);
      this.emit('failed', name, outcome.error);
    }

    this.publish();
  }

  private isCurrent(name: string, pending: PendingFetch): boolean {
    return this.objects.get(name)?.fetch === pending;
  }

  // ============================================
  // Helpers
  // ============================================

  private setSelected(name: string, selected: boolean): void {
    const object = this.objects.get(name);
    if (object) {
      object.state.selected = selected;
      this.pushFlags(name, object);
    }
  }

  private pushFlags(name: string, object: SceneObject): void {
    if (object.loaded) {
      this.renderer.setFlags(name, flagsOf(object));
    }
  }

  private publish(): void {
    this.overlay?.update(this.views());
  }
}

function createObject(version: number): SceneObject {
  return {
    state: { visible: true, selected: false, lastAppliedVersion: version },
    loaded: false,
    loadedVersion: 0,
    fetch: null,
  };
}

function flagsOf(object: SceneObject): RenderFlags {
  return { visible: object.state.visible, selected: object.state.selected };
}

function toView(name: string, object: SceneObject): SceneObjectView {
  return { name, ...object.state, loaded: object.loaded };
}
