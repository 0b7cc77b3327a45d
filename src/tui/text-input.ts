import { isPrintableKeyName, isSpaceKeyName } from './key-utils.js';

export interface TextInputState {
  value: string;
  /**
   * Cursor position measured in Unicode codepoints (i.e. `Array.from(value)` index).
   */
  cursor: number;
}

function toChars(value: string): string[] {
  return Array.from(value);
}

function clampCursor(value: string, cursor: number): number {
  return Math.max(0, Math.min(cursor, toChars(value).length));
}

export function createTextInput(initial: string): TextInputState {
  return { value: initial, cursor: toChars(initial).length };
}

function moveTo(state: TextInputState, cursor: number): TextInputState {
  return { value: state.value, cursor: clampCursor(state.value, cursor) };
}

function insertText(state: TextInputState, text: string): TextInputState {
  const chars = toChars(state.value);
  const inserted = toChars(text);
  chars.splice(state.cursor, 0, ...inserted);
  return { value: chars.join(''), cursor: state.cursor + inserted.length };
}

function deleteRange(state: TextInputState, start: number, end: number): TextInputState {
  const chars = toChars(state.value);
  const from = Math.max(0, Math.min(start, chars.length));
  const to = Math.max(0, Math.min(end, chars.length));
  if (to <= from) return state;
  chars.splice(from, to - from);
  return { value: chars.join(''), cursor: from };
}

function wordStartBefore(state: TextInputState): number {
  const chars = toChars(state.value);
  let i = state.cursor;
  while (i > 0 && /\s/.test(chars[i - 1] ?? '')) i--;
  while (i > 0 && !/\s/.test(chars[i - 1] ?? '')) i--;
  return i;
}

function wordEndAfter(state: TextInputState): number {
  const chars = toChars(state.value);
  let i = state.cursor;
  while (i < chars.length && /\s/.test(chars[i] ?? '')) i++;
  while (i < chars.length && !/\s/.test(chars[i] ?? '')) i++;
  return i;
}

type EditKeyHandler = (state: TextInputState) => TextInputState;

const EDIT_KEYS: Readonly<Record<string, EditKeyHandler>> = {
  LEFT: (s) => moveTo(s, s.cursor - 1),
  CTRL_B: (s) => moveTo(s, s.cursor - 1),
  RIGHT: (s) => moveTo(s, s.cursor + 1),
  CTRL_F: (s) => moveTo(s, s.cursor + 1),
  HOME: (s) => moveTo(s, 0),
  CTRL_A: (s) => moveTo(s, 0),
  END: (s) => moveTo(s, toChars(s.value).length),
  CTRL_E: (s) => moveTo(s, toChars(s.value).length),
  ALT_LEFT: (s) => moveTo(s, wordStartBefore(s)),
  CTRL_LEFT: (s) => moveTo(s, wordStartBefore(s)),
  ALT_B: (s) => moveTo(s, wordStartBefore(s)),
  ALT_RIGHT: (s) => moveTo(s, wordEndAfter(s)),
  CTRL_RIGHT: (s) => moveTo(s, wordEndAfter(s)),
  ALT_F: (s) => moveTo(s, wordEndAfter(s)),
  BACKSPACE: (s) => deleteRange(s, s.cursor - 1, s.cursor),
  DELETE: (s) => deleteRange(s, s.cursor, s.cursor + 1),
  CTRL_D: (s) => deleteRange(s, s.cursor, s.cursor + 1),
  CTRL_W: (s) => deleteRange(s, wordStartBefore(s), s.cursor),
  ALT_BACKSPACE: (s) => deleteRange(s, wordStartBefore(s), s.cursor),
  CTRL_U: (s) => deleteRange(s, 0, s.cursor),
  CTRL_K: (s) => deleteRange(s, s.cursor, toChars(s.value).length),
};

/**
 * Apply a line-editing key. Returns null for keys the editor does not handle
 * (ENTER, ESCAPE, TAB, …) so the caller can treat them as commands.
 */
export function applyTextInputKey(state: TextInputState, name: string): TextInputState | null {
  const normalized = moveTo(state, state.cursor);

  const handler = EDIT_KEYS[name];
  if (handler) return handler(normalized);

  if (isSpaceKeyName(name)) return insertText(normalized, ' ');
  if (isPrintableKeyName(name)) return insertText(normalized, name);

  return null;
}
