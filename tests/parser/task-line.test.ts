import { describe, expect, it } from 'vitest';
import {
  parseTaskFileContent,
  parseTaskLine,
  serializeTask,
  serializeTaskList,
} from '../../src/parser/task-line.js';
import { TaskSchema } from '../../src/schema/index.js';

describe('parseTaskLine', () => {
  it('reads every checkbox marker', () => {
    expect(parseTaskLine('- [ ] Buy milk')).toEqual({ kind: 'task', task: { text: 'Buy milk', status: 'todo' } });
    expect(parseTaskLine('- [~] Write report')).toEqual({
      kind: 'task',
      task: { text: 'Write report', status: 'doing' },
    });
    expect(parseTaskLine('- [x] Pay rent')).toEqual({ kind: 'task', task: { text: 'Pay rent', status: 'done' } });
    expect(parseTaskLine('- [X] Pay rent')).toEqual({ kind: 'task', task: { text: 'Pay rent', status: 'done' } });
    expect(parseTaskLine('- [!] Call bank')).toEqual({
      kind: 'task',
      task: { text: 'Call bank', status: 'important' },
    });
  });

  it('trims the text and tolerates indentation and CRLF endings', () => {
    expect(parseTaskLine('  - [ ]   spaced out  \r')).toEqual({
      kind: 'task',
      task: { text: 'spaced out', status: 'todo' },
    });
  });

  it('treats whitespace-only lines as blank', () => {
    expect(parseTaskLine('')).toEqual({ kind: 'blank' });
    expect(parseTaskLine('   \t')).toEqual({ kind: 'blank' });
  });

  it('rejects lines that are not checklist items', () => {
    expect(parseTaskLine('just some text')).toEqual({
      kind: 'malformed',
      reason: 'expected "- [ ] <text>", found "just some text"',
    });
    expect(parseTaskLine('- [?] unknown').kind).toBe('malformed');
    expect(parseTaskLine('- [ ]    ')).toEqual({ kind: 'malformed', reason: 'task has no text' });
  });
});

describe('serializeTask', () => {
  it('writes the marker for each status', () => {
    expect(serializeTask({ text: 'a', status: 'todo' })).toBe('- [ ] a');
    expect(serializeTask({ text: 'b', status: 'doing' })).toBe('- [~] b');
    expect(serializeTask({ text: 'c', status: 'done' })).toBe('- [x] c');
    expect(serializeTask({ text: 'd', status: 'important' })).toBe('- [!] d');
  });
});

describe('parseTaskFileContent', () => {
  it('skips a malformed line with a warning and keeps the valid one', () => {
    const parsed = parseTaskFileContent('this is not a task\n- [ ] Valid task\n', 'tasks.md');

    expect(parsed.tasks).toEqual([{ text: 'Valid task', status: 'todo' }]);
    expect(parsed.warnings).toHaveLength(1);
    expect(parsed.warnings[0]?.line).toBe(1);
    expect(parsed.warnings[0]?.message).toBe(
      'tasks.md:1: skipped malformed line: expected "- [ ] <text>", found "this is not a task"'
    );
  });

  it('skips blank lines without warnings', () => {
    const parsed = parseTaskFileContent('- [ ] A\n\n\n- [x] B\n', 'tasks.md');
    expect(parsed.tasks.map((t) => t.text)).toEqual(['A', 'B']);
    expect(parsed.warnings).toEqual([]);
  });
});

describe('serializeTaskList', () => {
  it('writes one line per task with a trailing newline', () => {
    expect(
      serializeTaskList([
        { text: 'A', status: 'todo' },
        { text: 'B', status: 'done' },
      ])
    ).toBe('- [ ] A\n- [x] B\n');
  });

  it('writes an empty file for an empty list', () => {
    expect(serializeTaskList([])).toBe('');
  });
});

describe('TaskSchema', () => {
  it('reports the same reasons the line parser uses', () => {
    const badStatus = TaskSchema.safeParse({ text: 'a', status: 'later' });
    expect(badStatus.success ? null : badStatus.error.issues[0]?.message).toBe('unknown checkbox marker');

    const noText = TaskSchema.safeParse({ text: '', status: 'todo' });
    expect(noText.success ? null : noText.error.issues[0]?.message).toBe('task has no text');
  });
});
