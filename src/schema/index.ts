import { z } from 'zod';

export const TaskStatusSchema = z.enum(['todo', 'doing', 'done', 'important'], {
  errorMap: () => ({ message: 'unknown checkbox marker' }),
});
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

export const TaskSchema = z.object({
  text: z.string().min(1, 'task has no text'),
  status: TaskStatusSchema,
});
export type Task = z.infer<typeof TaskSchema>;

/** Order used by `cycle`: todo → doing → done → important → todo. */
export const STATUS_CYCLE: readonly TaskStatus[] = ['todo', 'doing', 'done', 'important'];

export function isCompleted(task: Task): boolean {
  return task.status === 'done';
}
