/**
 * Scene Types
 * 
 * Client-side replica of which objects exist, are visible or selected.
 */

export interface SceneObjectState {
  visible: boolean;
  selected: boolean;
  lastAppliedVersion: number;
  loadError?: string;
}

/**
 * Read-only row handed to the overlay for one object
 */
export interface SceneObjectView extends SceneObjectState {
  name: string;
  /** True once a representation has been attached to the renderer */
  loaded: boolean;
}
