import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TaskStore } from '../../src/store/task-store.js';
import { createAppState } from '../../src/tui/modes.js';
import { applyKey } from '../../src/tui/session.js';

let tempDir: string;

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'todo-session-'));
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('applyKey', () => {
  it('saves after every change', () => {
    const filePath = path.join(tempDir, 'tasks.md');
    const state = createAppState(new TaskStore(filePath));

    for (const key of ['a', ...Array.from('Buy milk')]) applyKey(state, key);
    expect(fs.existsSync(filePath)).toBe(false);

    expect(applyKey(state, 'ENTER')).toEqual({ kind: 'continue', changed: true });
    expect(fs.readFileSync(filePath, 'utf-8')).toBe('- [ ] Buy milk\n');

    applyKey(state, 'x');
    expect(fs.readFileSync(filePath, 'utf-8')).toBe('- [x] Buy milk\n');
  });

  it('does not write when nothing changed', () => {
    const filePath = path.join(tempDir, 'tasks.md');
    const state = createAppState(new TaskStore(filePath));
    applyKey(state, 'j');
    applyKey(state, 'v');
    expect(fs.existsSync(filePath)).toBe(false);
  });

  it('rolls the list back and reports when the save fails', () => {
    fs.writeFileSync(path.join(tempDir, 'blocker'), 'not a directory', 'utf-8');
    const store = new TaskStore(path.join(tempDir, 'blocker', 'tasks.md'));
    store.add('A');
    store.add('B');
    const state = createAppState(store);
    state.cursor = 1;

    expect(applyKey(state, 'd')).toEqual({ kind: 'continue', changed: false });
    expect(applyKey(state, 'd')).toEqual({ kind: 'continue', changed: false });

    expect(store.list().map((t) => t.text)).toEqual(['A', 'B']);
    expect(state.cursor).toBe(1);
    expect(state.message?.startsWith(`Error: Failed writing ${path.join(tempDir, 'blocker', 'tasks.md')}`)).toBe(
      true
    );
  });

  it('passes quit through without saving', () => {
    const filePath = path.join(tempDir, 'tasks.md');
    const state = createAppState(new TaskStore(filePath));
    expect(applyKey(state, 'q')).toEqual({ kind: 'quit' });
    expect(fs.existsSync(filePath)).toBe(false);
  });
});
