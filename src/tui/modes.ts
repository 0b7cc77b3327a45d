import type { TaskStore } from '../store/task-store.js';
import type { TextInputState } from './text-input.js';

export type ViewMode = 'list' | 'grouped';

export type PendingOperator = 'd';

export type InsertTarget =
  /** New task inserted at `at` once confirmed. */
  | { kind: 'add'; at: number }
  | { kind: 'edit'; index: number };

export type Mode =
  | { kind: 'normal'; pending: PendingOperator | null }
  | { kind: 'insert'; target: InsertTarget; input: TextInputState };

export type ModeKind = Mode['kind'];

export interface AppState {
  store: TaskStore;
  /** Index into the task list, not into display rows. */
  cursor: number;
  mode: Mode;
  view: ViewMode;
  /** First visible display row; kept in range by the renderer. */
  scroll: number;
  message: string | null;
}

export function normalMode(): Mode {
  return { kind: 'normal', pending: null };
}

export function createAppState(store: TaskStore, options: { view?: ViewMode; message?: string | null } = {}): AppState {
  return {
    store,
    cursor: 0,
    mode: normalMode(),
    view: options.view ?? 'list',
    scroll: 0,
    message: options.message ?? null,
  };
}
