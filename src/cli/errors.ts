export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export type TaskFileOperation = 'read' | 'write';

export class TaskFileError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly operation: TaskFileOperation,
    public readonly code: string | undefined,
    cause?: unknown
  ) {
    super(describeFileFailure(filePath, operation, code, cause), { cause });
    this.name = 'TaskFileError';
  }
}

/**
 * A task file line that could not be read. Collected as a warning by the
 * loader; the rest of the file still loads.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly line?: number
  ) {
    super(line ? `${filePath}:${line}: ${message}` : `${filePath}: ${message}`);
    this.name = 'ParseError';
  }
}

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function describeFileFailure(
  filePath: string,
  operation: TaskFileOperation,
  code: string | undefined,
  cause: unknown
): string {
  const verb = operation === 'read' ? 'reading' : 'writing';
  if (code === 'EACCES' || code === 'EPERM') {
    return `Permission denied ${verb} ${filePath}`;
  }
  if (code === 'EISDIR') {
    return `Expected a file but found a directory: ${filePath}`;
  }
  const detail = cause instanceof Error ? cause.message : String(cause ?? 'unknown error');
  return `Failed ${verb} ${filePath}: ${detail}`;
}
