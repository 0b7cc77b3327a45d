import fs from 'node:fs';
import path from 'node:path';
import { TaskFileError, errnoCode } from '../cli/errors.js';
import { parseTaskFileContent, serializeTaskList, type ParsedTaskFile } from '../parser/task-line.js';
import type { Task } from '../schema/index.js';

/**
 * Read and parse the task file. A missing file is an empty list; any other
 * read failure throws `TaskFileError`.
 */
export function readTaskFile(filePath: string): ParsedTaskFile {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const code = errnoCode(error);
    if (code === 'ENOENT') {
      return { tasks: [], warnings: [] };
    }
    throw new TaskFileError(filePath, 'read', code, error);
  }
  return parseTaskFileContent(content, filePath);
}

export function tempPathFor(filePath: string): string {
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.tmp`);
}

/**
 * Write the list to a temp file beside the target, then rename it into place.
 * Creates the parent directory when missing.
 */
export function writeTaskFile(filePath: string, tasks: readonly Task[]): void {
  const tempPath = tempPathFor(filePath);
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(tempPath, serializeTaskList(tasks), 'utf-8');
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    if (fs.existsSync(tempPath)) fs.rmSync(tempPath, { force: true });
    throw new TaskFileError(filePath, 'write', errnoCode(error), error);
  }
}
