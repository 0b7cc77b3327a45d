import type { Task, TaskStatus } from '../schema/index.js';
import type { ViewMode } from './modes.js';

export type DisplayRow =
  | { kind: 'task'; index: number; task: Task }
  | { kind: 'heading'; status: TaskStatus; label: string; count: number }
  | { kind: 'spacer' };

const GROUPS: readonly { status: TaskStatus; label: string }[] = [
  { status: 'todo', label: 'TO DO:' },
  { status: 'done', label: 'DONE:' },
  { status: 'doing', label: 'IN PROGRESS:' },
  { status: 'important', label: 'IMPORTANT:' },
];

export function buildDisplayRows(tasks: readonly Task[], view: ViewMode): DisplayRow[] {
  if (view === 'list') {
    return tasks.map((task, index) => ({ kind: 'task', index, task }));
  }

  const rows: DisplayRow[] = [];
  for (const group of GROUPS) {
    const members: DisplayRow[] = [];
    tasks.forEach((task, index) => {
      if (task.status === group.status) members.push({ kind: 'task', index, task });
    });
    if (members.length === 0) continue;
    if (rows.length > 0) rows.push({ kind: 'spacer' });
    rows.push({ kind: 'heading', status: group.status, label: group.label, count: members.length });
    rows.push(...members);
  }
  return rows;
}

/** Task indices in the order the view shows them. */
export function displayOrder(tasks: readonly Task[], view: ViewMode): number[] {
  const order: number[] = [];
  for (const row of buildDisplayRows(tasks, view)) {
    if (row.kind === 'task') order.push(row.index);
  }
  return order;
}

export function stepCursor(tasks: readonly Task[], view: ViewMode, cursor: number, delta: number): number {
  const order = displayOrder(tasks, view);
  if (order.length === 0) return 0;
  const pos = Math.max(0, order.indexOf(cursor));
  const next = Math.min(Math.max(pos + delta, 0), order.length - 1);
  return order[next] ?? 0;
}

export function firstInDisplay(tasks: readonly Task[], view: ViewMode): number {
  return displayOrder(tasks, view)[0] ?? 0;
}

export function lastInDisplay(tasks: readonly Task[], view: ViewMode): number {
  const order = displayOrder(tasks, view);
  return order[order.length - 1] ?? 0;
}
