import type { ParseError } from '../cli/errors.js';
import { STATUS_CYCLE, type Task, type TaskStatus } from '../schema/index.js';
import { readTaskFile, writeTaskFile } from './task-file.js';

export type MoveDirection = -1 | 1;

export interface LoadReport {
  taskCount: number;
  warnings: ParseError[];
}

export type TaskSnapshot = readonly Task[];

export function clampCursor(cursor: number, length: number): number {
  if (length <= 0) return 0;
  return Math.min(Math.max(cursor, 0), length - 1);
}

function normalizeText(text: string): string {
  return text.replace(/[\r\n]+/g, ' ').trim();
}

/**
 * Ordered task list backed by a markdown checklist file. Tasks are positional:
 * every operation takes an index, and out-of-range indices are no-ops.
 */
export class TaskStore {
  private tasks: Task[] = [];

  constructor(public readonly filePath: string) {}

  get size(): number {
    return this.tasks.length;
  }

  list(): readonly Task[] {
    return this.tasks.map((t) => ({ ...t }));
  }

  get(index: number): Task | null {
    const task = this.tasks[index];
    return task ? { ...task } : null;
  }

  load(): LoadReport {
    const { tasks, warnings } = readTaskFile(this.filePath);
    this.tasks = tasks;
    return { taskCount: tasks.length, warnings };
  }

  save(): void {
    writeTaskFile(this.filePath, this.tasks);
  }

  snapshot(): TaskSnapshot {
    return this.list();
  }

  restore(snapshot: TaskSnapshot): void {
    this.tasks = snapshot.map((t) => ({ ...t }));
  }

  /** Append a task. Returns its index, or null when the text is empty. */
  add(text: string): number | null {
    return this.insert(this.tasks.length, text);
  }

  insert(index: number, text: string): number | null {
    const normalized = normalizeText(text);
    if (!normalized) return null;
    const at = Math.min(Math.max(index, 0), this.tasks.length);
    this.tasks.splice(at, 0, { text: normalized, status: 'todo' });
    return at;
  }

  toggle(index: number): boolean {
    const task = this.tasks[index];
    if (!task) return false;
    task.status = task.status === 'done' ? 'todo' : 'done';
    return true;
  }

  cycle(index: number): boolean {
    const task = this.tasks[index];
    if (!task) return false;
    task.status = nextStatus(task.status);
    return true;
  }

  edit(index: number, newText: string): boolean {
    const task = this.tasks[index];
    const normalized = normalizeText(newText);
    if (!task || !normalized || normalized === task.text) return false;
    task.text = normalized;
    return true;
  }

  remove(index: number): boolean {
    if (index < 0 || index >= this.tasks.length) return false;
    this.tasks.splice(index, 1);
    return true;
  }

  /** Swap with the neighbour in `direction`. Returns the task's new index, or null at a boundary. */
  reorder(index: number, direction: MoveDirection): number | null {
    const target = index + direction;
    const task = this.tasks[index];
    const neighbour = this.tasks[target];
    if (!task || !neighbour) return null;
    this.tasks[index] = neighbour;
    this.tasks[target] = task;
    return target;
  }
}

function nextStatus(status: TaskStatus): TaskStatus {
  const i = STATUS_CYCLE.indexOf(status);
  return STATUS_CYCLE[(i + 1) % STATUS_CYCLE.length] ?? 'todo';
}
