import { checkboxFor } from '../parser/task-line.js';
import { isCompleted, type Task, type TaskStatus } from '../schema/index.js';
import { buildDisplayRows, type DisplayRow } from './display-order.js';
import { layoutInputField } from './input-render.js';
import {
  COMPACT_SHORTCUTS_BELOW,
  ellipsize,
  getListHeight,
  joinShortcuts,
  scrollToShow,
  textWidth,
} from './layout.js';
import { INSERT_SHORTCUTS, NORMAL_SHORTCUTS_COMPACT, NORMAL_SHORTCUTS_FULL } from './keymap.js';
import type { AppState, Mode } from './modes.js';

export type SegmentStyle =
  | 'text'
  | 'bold'
  | 'dim'
  | 'inverse'
  | 'yellow'
  | 'green'
  | 'red'
  | 'field'
  | 'fieldCursor';

export interface Segment {
  text: string;
  style: SegmentStyle;
}

export interface FrameLine {
  segments: Segment[];
  /** Style used to pad the line to the full width. */
  fill: SegmentStyle;
}

export interface Frame {
  width: number;
  height: number;
  lines: FrameLine[];
  /** 1-based terminal position for the visible cursor, or null to hide it. */
  cursor: { x: number; y: number } | null;
  scroll: number;
}

export interface TerminalSize {
  width: number;
  height: number;
}

export const TITLE = 'Todo List';
export const EMPTY_LIST_HINT = "No tasks yet. Press 'a' to add a task.";

const STATUS_STYLE: Record<TaskStatus, SegmentStyle> = {
  todo: 'text',
  doing: 'yellow',
  done: 'green',
  important: 'red',
};

function line(segments: Segment[], fill: SegmentStyle = 'text'): FrameLine {
  return { segments, fill };
}

const BLANK: FrameLine = line([]);

function headerLine(tasks: readonly Task[], state: AppState, width: number): FrameLine {
  const done = tasks.filter(isCompleted).length;
  const viewLabel = state.view === 'grouped' ? ' [grouped]' : '';
  const title = ellipsize(`${TITLE} (${done}/${tasks.length} done)${viewLabel}`, width);
  const pad = Math.max(0, Math.floor((width - textWidth(title)) / 2));
  return line([
    { text: ' '.repeat(pad), style: 'text' },
    { text: title, style: 'bold' },
  ]);
}

function taskLine(
  row: Extract<DisplayRow, { kind: 'task' }>,
  selected: boolean,
  numberWidth: number,
  width: number
): FrameLine {
  const gutter = `${selected ? '›' : ' '}${String(row.index + 1).padStart(numberWidth)}│ `;
  const content = ellipsize(`${checkboxFor(row.task.status)} ${row.task.text}`, Math.max(0, width - textWidth(gutter)));
  if (selected) {
    return line(
      [
        { text: gutter, style: 'inverse' },
        { text: content, style: 'inverse' },
      ],
      'inverse'
    );
  }
  return line([
    { text: gutter, style: 'dim' },
    { text: content, style: STATUS_STYLE[row.task.status] },
  ]);
}

function displayLine(row: DisplayRow, cursor: number, numberWidth: number, width: number): FrameLine {
  switch (row.kind) {
    case 'task':
      return taskLine(row, row.index === cursor, numberWidth, width);
    case 'heading':
      return line([
        { text: ellipsize(row.label, width), style: 'bold' },
        { text: ellipsize(` (${row.count})`, Math.max(0, width - textWidth(row.label))), style: 'dim' },
      ]);
    case 'spacer':
      return BLANK;
  }
}

function promptLine(state: AppState, width: number): { line: FrameLine; cursorCol: number | null } {
  const mode: Mode = state.mode;
  if (mode.kind === 'insert') {
    const field = layoutInputField({
      label: mode.target.kind === 'edit' ? 'Edit ' : 'Add ',
      input: mode.input,
      width,
      placeholder: mode.target.kind === 'add' ? 'type the task text…' : undefined,
    });
    return { line: line(field.segments), cursorCol: field.cursorCol };
  }
  if (state.message) {
    return { line: line([{ text: ellipsize(state.message, width), style: 'yellow' }]), cursorCol: null };
  }
  if (mode.pending === 'd') {
    return { line: line([{ text: ellipsize('d… press d again to delete', width), style: 'dim' }]), cursorCol: null };
  }
  return { line: BLANK, cursorCol: null };
}

function shortcutLine(mode: Mode, width: number): FrameLine {
  const chunks =
    mode.kind === 'insert'
      ? ['-- INSERT --', ...INSERT_SHORTCUTS]
      : width < COMPACT_SHORTCUTS_BELOW
        ? NORMAL_SHORTCUTS_COMPACT
        : NORMAL_SHORTCUTS_FULL;
  return line([{ text: joinShortcuts(chunks, width), style: 'dim' }]);
}

/**
 * Describe one full screen for `state` at `size`. Pure: the caller paints the
 * result and stores `scroll` back into the state.
 */
export function buildFrame(state: AppState, size: TerminalSize): Frame {
  const width = Math.max(0, size.width);
  const height = Math.max(0, size.height);
  const tasks = state.store.list();
  const rows = buildDisplayRows(tasks, state.view);
  const listHeight = getListHeight(height);

  const cursorRow = rows.findIndex((r) => r.kind === 'task' && r.index === state.cursor);
  const scroll = scrollToShow(cursorRow, state.scroll, listHeight, rows.length);
  const numberWidth = Math.max(2, String(Math.max(1, tasks.length)).length);

  const lines: FrameLine[] = [headerLine(tasks, state, width), BLANK];

  for (let i = 0; i < listHeight; i++) {
    const row = rows[scroll + i];
    if (row) {
      lines.push(displayLine(row, state.cursor, numberWidth, width));
    } else if (i === 0 && tasks.length === 0) {
      lines.push(line([{ text: ellipsize(EMPTY_LIST_HINT, width), style: 'dim' }]));
    } else {
      lines.push(BLANK);
    }
  }

  lines.push(line([{ text: '─'.repeat(width), style: 'dim' }]));
  const prompt = promptLine(state, width);
  const promptRow = lines.length + 1;
  lines.push(prompt.line);
  lines.push(shortcutLine(state.mode, width));

  const visible = lines.slice(0, height);
  const cursor =
    prompt.cursorCol !== null && promptRow <= height ? { x: prompt.cursorCol, y: promptRow } : null;

  return { width, height, lines: visible, cursor, scroll };
}
