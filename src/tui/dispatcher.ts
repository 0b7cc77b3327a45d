import { clampCursor, type MoveDirection } from '../store/task-store.js';
import { firstInDisplay, lastInDisplay, stepCursor } from './display-order.js';
import { INTERRUPT_KEY, NORMAL_KEYMAP, type NormalCommand } from './keymap.js';
import { normalMode, type AppState, type InsertTarget, type Mode, type ModeKind } from './modes.js';
import { applyTextInputKey, createTextInput } from './text-input.js';

export type DispatchOutcome =
  /** `changed` means the task list was mutated and must be persisted. */
  | { kind: 'continue'; changed: boolean }
  | { kind: 'quit' };

const UNCHANGED: DispatchOutcome = { kind: 'continue', changed: false };
const CHANGED: DispatchOutcome = { kind: 'continue', changed: true };
const QUIT: DispatchOutcome = { kind: 'quit' };

type ModeHandlers = {
  [K in ModeKind]: (state: AppState, mode: Extract<Mode, { kind: K }>, key: string) => DispatchOutcome;
};

type CommandHandler = (state: AppState) => DispatchOutcome;

function outcome(changed: boolean): DispatchOutcome {
  return changed ? CHANGED : UNCHANGED;
}

function enterInsert(state: AppState, target: InsertTarget, initialText: string): DispatchOutcome {
  state.mode = { kind: 'insert', target, input: createTextInput(initialText) };
  return UNCHANGED;
}

function moveTask(state: AppState, direction: MoveDirection): DispatchOutcome {
  if (state.view !== 'list') {
    state.message = 'Reordering is only available in list view (press v)';
    return UNCHANGED;
  }
  const next = state.store.reorder(state.cursor, direction);
  if (next === null) return UNCHANGED;
  state.cursor = next;
  return CHANGED;
}

const NORMAL_COMMANDS: Readonly<Record<NormalCommand, CommandHandler>> = {
  cursorDown: (state) => {
    state.cursor = stepCursor(state.store.list(), state.view, state.cursor, 1);
    return UNCHANGED;
  },
  cursorUp: (state) => {
    state.cursor = stepCursor(state.store.list(), state.view, state.cursor, -1);
    return UNCHANGED;
  },
  cursorFirst: (state) => {
    state.cursor = firstInDisplay(state.store.list(), state.view);
    return UNCHANGED;
  },
  cursorLast: (state) => {
    state.cursor = lastInDisplay(state.store.list(), state.view);
    return UNCHANGED;
  },
  moveDown: (state) => moveTask(state, 1),
  moveUp: (state) => moveTask(state, -1),
  toggle: (state) => outcome(state.store.toggle(state.cursor)),
  cycle: (state) => outcome(state.store.cycle(state.cursor)),
  delete: (state) => {
    if (state.store.size > 0) state.mode = { kind: 'normal', pending: 'd' };
    return UNCHANGED;
  },
  append: (state) => enterInsert(state, { kind: 'add', at: state.store.size }, ''),
  openBelow: (state) =>
    enterInsert(state, { kind: 'add', at: state.store.size === 0 ? 0 : state.cursor + 1 }, ''),
  openAbove: (state) => enterInsert(state, { kind: 'add', at: state.cursor }, ''),
  edit: (state) => {
    const task = state.store.get(state.cursor);
    if (!task) return UNCHANGED;
    return enterInsert(state, { kind: 'edit', index: state.cursor }, task.text);
  },
  switchView: (state) => {
    state.view = state.view === 'list' ? 'grouped' : 'list';
    state.scroll = 0;
    return UNCHANGED;
  },
  dismiss: (state) => {
    state.message = null;
    return UNCHANGED;
  },
  quit: () => QUIT,
};

function confirmInsert(state: AppState, target: InsertTarget, value: string): DispatchOutcome {
  state.mode = normalMode();
  if (target.kind === 'edit') {
    return outcome(state.store.edit(target.index, value));
  }
  const index = state.store.insert(target.at, value);
  if (index === null) return UNCHANGED;
  state.cursor = index;
  return CHANGED;
}

export const MODE_HANDLERS: ModeHandlers = {
  normal: (state, mode, key) => {
    if (mode.pending === 'd') {
      state.mode = normalMode();
      if (key !== 'd') return UNCHANGED;
      return outcome(state.store.remove(state.cursor));
    }
    const command = NORMAL_KEYMAP[key];
    if (!command) return UNCHANGED;
    return NORMAL_COMMANDS[command](state);
  },
  insert: (state, mode, key) => {
    if (key === 'ESCAPE') {
      state.mode = normalMode();
      return UNCHANGED;
    }
    if (key === 'ENTER') {
      return confirmInsert(state, mode.target, mode.input.value);
    }
    const input = applyTextInputKey(mode.input, key);
    if (input) state.mode = { ...mode, input };
    return UNCHANGED;
  },
};

/**
 * Handle one key. Mutates `state` in place; the caller persists the store
 * when the outcome reports a change.
 */
export function dispatchKey(state: AppState, key: string): DispatchOutcome {
  if (key === INTERRUPT_KEY) return QUIT;

  if (state.mode.kind === 'normal' && key !== 'ESCAPE') {
    state.message = null;
  }

  const result = runModeHandler(state, key);
  state.cursor = clampCursor(state.cursor, state.store.size);
  return result;
}

function runModeHandler(state: AppState, key: string): DispatchOutcome {
  const mode = state.mode;
  switch (mode.kind) {
    case 'normal':
      return MODE_HANDLERS.normal(state, mode, key);
    case 'insert':
      return MODE_HANDLERS.insert(state, mode, key);
  }
}
