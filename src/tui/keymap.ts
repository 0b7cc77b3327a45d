export type NormalCommand =
  | 'cursorDown'
  | 'cursorUp'
  | 'cursorFirst'
  | 'cursorLast'
  | 'moveDown'
  | 'moveUp'
  | 'toggle'
  | 'cycle'
  | 'delete'
  | 'append'
  | 'openBelow'
  | 'openAbove'
  | 'edit'
  | 'switchView'
  | 'dismiss'
  | 'quit';

export const NORMAL_KEYMAP: Readonly<Record<string, NormalCommand>> = {
  j: 'cursorDown',
  DOWN: 'cursorDown',
  k: 'cursorUp',
  UP: 'cursorUp',
  g: 'cursorFirst',
  HOME: 'cursorFirst',
  G: 'cursorLast',
  END: 'cursorLast',
  J: 'moveDown',
  SHIFT_DOWN: 'moveDown',
  ALT_J: 'moveDown',
  K: 'moveUp',
  SHIFT_UP: 'moveUp',
  ALT_K: 'moveUp',
  x: 'toggle',
  ' ': 'toggle',
  SPACE: 'toggle',
  c: 'cycle',
  d: 'delete',
  a: 'append',
  i: 'append',
  o: 'openBelow',
  O: 'openAbove',
  e: 'edit',
  ENTER: 'edit',
  v: 'switchView',
  ESCAPE: 'dismiss',
  q: 'quit',
};

/** Interrupt; quits from any mode. */
export const INTERRUPT_KEY = 'CTRL_C';

export const NORMAL_HELP_ENTRIES: readonly (readonly [string, string])[] = [
  ['j/k, ↓/↑', 'Move cursor'],
  ['g/G', 'First / last task'],
  ['J/K, Shift+↓/↑', 'Move task down / up (list view)'],
  ['x, space', 'Toggle done'],
  ['c', 'Cycle todo → in progress → done → important'],
  ['dd', 'Delete task'],
  ['a, i', 'Add task at the end'],
  ['o/O', 'Add task below / above cursor'],
  ['e, Enter', 'Edit task text'],
  ['v', 'Switch list / grouped view'],
  ['q, Ctrl+C', 'Save and quit'],
];

export const INSERT_HELP_ENTRIES: readonly (readonly [string, string])[] = [
  ['Enter', 'Confirm'],
  ['Esc', 'Cancel'],
  ['←/→, Home/End', 'Move within the text'],
  ['Ctrl+W, Ctrl+U, Ctrl+K', 'Delete word / to start / to end'],
];

export const NORMAL_SHORTCUTS_FULL = [
  '[j/k] move',
  '[a/i] add',
  '[o/O] add below/above',
  '[e] edit',
  '[x/space] toggle',
  '[c] cycle',
  '[dd] delete',
  '[J/K] reorder',
  '[v] view',
  '[q] quit',
];
export const NORMAL_SHORTCUTS_COMPACT = ['[a] add', '[e] edit', '[x] toggle', '[dd] del', '[q] quit'];

export const INSERT_SHORTCUTS = ['[Enter] confirm', '[Esc] cancel', '[←/→] move', '[Ctrl+U] clear'];
