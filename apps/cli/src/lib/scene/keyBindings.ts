/**
 * Keyboard controls for the terminal viewer
 */

export type KeyAction =
  | 'select-previous'
  | 'select-next'
  | 'deselect'
  | 'toggle-visibility'
  | 'show-all'
  | 'reload'
  | 'toggle-list'
  | 'quit'
  | 'close';

// Shape of readline's keypress event
export interface KeyPress {
  name?: string;
  sequence?: string;
  shift?: boolean;
  ctrl?: boolean;
}

export function actionForKey(key: KeyPress): KeyAction | undefined {
  if (key.ctrl) {
    return key.name === 'c' ? 'close' : undefined;
  }

  switch (key.sequence) {
    case '[':
      return 'select-previous';
    case ']':
      return 'select-next';
  }

  switch (key.name) {
    case 'escape':
      return 'deselect';
    case 'h':
      return key.shift ? 'show-all' : 'toggle-visibility';
    case 'r':
      return 'reload';
    case 'tab':
      return 'toggle-list';
    case 'q':
      return 'quit';
    default:
      return undefined;
  }
}

export interface KeyBinding {
  keys: string;
  description: string;
  action: KeyAction;
  // A keypress that triggers the action
  press: KeyPress;
}

export const KEY_BINDINGS: readonly KeyBinding[] = [
  { keys: '[', description: 'select previous file', action: 'select-previous', press: { sequence: '[' } },
  { keys: ']', description: 'select next file', action: 'select-next', press: { sequence: ']' } },
  { keys: 'Esc', description: 'clear selection', action: 'deselect', press: { name: 'escape' } },
  { keys: 'h', description: 'hide or show the selected file', action: 'toggle-visibility', press: { name: 'h', sequence: 'h' } },
  { keys: 'H', description: 'show every file', action: 'show-all', press: { name: 'h', sequence: 'H', shift: true } },
  { keys: 'r', description: 'reconnect now and reload everything', action: 'reload', press: { name: 'r', sequence: 'r' } },
  { keys: 'Tab', description: 'hide or show the file list', action: 'toggle-list', press: { name: 'tab', sequence: '\t' } },
  { keys: 'q', description: 'quit the viewer and ask the server to stop', action: 'quit', press: { name: 'q', sequence: 'q' } },
  { keys: 'Ctrl+C', description: 'quit the viewer only', action: 'close', press: { name: 'c', ctrl: true } },
];

/**
 * One line per binding, keys padded to a common column
 */
export function formatKeyHelp(bindings: readonly KeyBinding[] = KEY_BINDINGS): string[] {
  const width = Math.max(...bindings.map(binding => binding.keys.length));
  return bindings.map(binding => `  ${binding.keys.padEnd(width)}  ${binding.description}`);
}
