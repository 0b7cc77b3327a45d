import { ParseError } from '../cli/errors.js';
import { TaskSchema, type Task, type TaskStatus } from '../schema/index.js';

const TASK_LINE_REGEX = /^\s*- \[([ xX~!])\] (.*)$/;

const MARKER_TO_STATUS: Record<string, TaskStatus> = {
  ' ': 'todo',
  '~': 'doing',
  x: 'done',
  X: 'done',
  '!': 'important',
};

const STATUS_TO_MARKER: Record<TaskStatus, string> = {
  todo: ' ',
  doing: '~',
  done: 'x',
  important: '!',
};

export type LineParseResult =
  | { kind: 'task'; task: Task }
  | { kind: 'blank' }
  | { kind: 'malformed'; reason: string };

export interface ParsedTaskFile {
  tasks: Task[];
  warnings: ParseError[];
}

export function checkboxFor(status: TaskStatus): string {
  return `[${STATUS_TO_MARKER[status]}]`;
}

export function parseTaskLine(line: string): LineParseResult {
  const normalized = line.replace(/\r$/, '');
  if (normalized.trim() === '') {
    return { kind: 'blank' };
  }

  const match = normalized.match(TASK_LINE_REGEX);
  if (!match) {
    return { kind: 'malformed', reason: `expected "- [ ] <text>", found "${normalized.trim()}"` };
  }

  const [, marker = '', rawText = ''] = match;
  const parsed = TaskSchema.safeParse({ text: rawText.trim(), status: MARKER_TO_STATUS[marker] });
  if (!parsed.success) {
    return { kind: 'malformed', reason: parsed.error.issues[0]?.message ?? 'invalid task' };
  }
  return { kind: 'task', task: parsed.data };
}

export function serializeTask(task: Task): string {
  return `- ${checkboxFor(task.status)} ${task.text}`;
}

/**
 * Parse a whole task file. Blank lines are skipped; malformed lines are
 * skipped and reported with their 1-based line number.
 */
export function parseTaskFileContent(content: string, filePath: string): ParsedTaskFile {
  const tasks: Task[] = [];
  const warnings: ParseError[] = [];

  const lines = content.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const result = parseTaskLine(lines[i] ?? '');
    if (result.kind === 'task') {
      tasks.push(result.task);
    } else if (result.kind === 'malformed') {
      warnings.push(new ParseError(`skipped malformed line: ${result.reason}`, filePath, i + 1));
    }
  }

  return { tasks, warnings };
}

export function serializeTaskList(tasks: readonly Task[]): string {
  if (tasks.length === 0) {
    return '';
  }
  return tasks.map(serializeTask).join('\n') + '\n';
}
