/**
 * Headless OBJ renderer
 *
 * Stands in for a 3D view in the terminal: "loading" a mesh means
 * counting its vertices and faces; attached summaries are kept per name.
 */

import type { LoadResult, MeshRenderer, RenderFlags } from '@meshwatch/viewer';

export interface ObjSummary {
  vertices: number;
  faces: number;
  groups: number;
}

export interface AttachedMesh {
  summary: ObjSummary;
  flags: RenderFlags;
}

export function summarizeObj(text: string): ObjSummary {
  const summary: ObjSummary = { vertices: 0, faces: 0, groups: 0 };
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trimStart();
    if (line.startsWith('v ')) {
      summary.vertices++;
    } else if (line.startsWith('f ')) {
      summary.faces++;
    } else if (line.startsWith('g ') || line.startsWith('o ')) {
      summary.groups++;
    }
  }
  return summary;
}

export function formatSummary(summary: ObjSummary): string {
  return `${summary.vertices} vertices, ${summary.faces} faces`;
}

export class ObjSummaryRenderer implements MeshRenderer<ObjSummary> {
  private meshes: Map<string, AttachedMesh> = new Map();
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  load(_name: string, bytes: Uint8Array): LoadResult<ObjSummary> {
    let text: string;
    try {
      text = this.decoder.decode(bytes);
    } catch {
      return { ok: false, error: 'File is not valid UTF-8 text' };
    }

    const summary = summarizeObj(text);
    if (summary.vertices === 0) {
      return { ok: false, error: 'No vertices found' };
    }
    return { ok: true, renderable: summary };
  }

  attach(name: string, summary: ObjSummary, flags: RenderFlags): void {
    this.meshes.set(name, { summary, flags: { ...flags } });
  }

  unload(name: string): void {
    this.meshes.delete(name);
  }

  setFlags(name: string, flags: RenderFlags): void {
    const mesh = this.meshes.get(name);
    if (mesh) {
      mesh.flags = { ...flags };
    }
  }

  get(name: string): AttachedMesh | undefined {
    return this.meshes.get(name);
  }

  get size(): number {
    return this.meshes.size;
  }
}
