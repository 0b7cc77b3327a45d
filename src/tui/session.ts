import { TaskFileError } from '../cli/errors.js';
import { clampCursor } from '../store/task-store.js';
import { dispatchKey, type DispatchOutcome } from './dispatcher.js';
import type { AppState } from './modes.js';

/**
 * Dispatch one key and persist the store when the key changed it. A failed
 * save restores the list and cursor as they were before the key.
 */
export function applyKey(state: AppState, key: string): DispatchOutcome {
  const before = state.store.snapshot();
  const cursorBefore = state.cursor;

  const outcome = dispatchKey(state, key);
  if (outcome.kind !== 'continue' || !outcome.changed) {
    return outcome;
  }

  try {
    state.store.save();
  } catch (error) {
    if (!(error instanceof TaskFileError)) throw error;
    state.store.restore(before);
    state.cursor = clampCursor(cursorBefore, state.store.size);
    state.message = `Error: ${error.message}`;
    return { kind: 'continue', changed: false };
  }
  return outcome;
}
