export type TaskHiveErrorCode =
  | 'VALIDATION'
  | 'STORE_BUSY'
  | 'NOT_FOUND'
  | 'DUPLICATE_REGISTRATION'
  | 'UNKNOWN_TYPE'
  | 'HANDLER'
  | 'CONFIG';

export class TaskHiveError extends Error {
  readonly code: TaskHiveErrorCode;

  constructor(code: TaskHiveErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Rejected producer input. Never retried. */
export class ValidationError extends TaskHiveError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('VALIDATION', message);
    this.issues = issues;
  }
}

/** The queue file stayed locked past the busy timeout. Callers may retry. */
export class StoreBusyError extends TaskHiveError {
  constructor(operation: string, cause: unknown) {
    super('STORE_BUSY', `Queue store busy during ${operation}`, { cause });
  }
}

export class NotFoundError extends TaskHiveError {
  constructor(what: string, id: string | number) {
    super('NOT_FOUND', `${what} ${id} not found`);
  }
}

export class DuplicateRegistrationError extends TaskHiveError {
  constructor(taskType: string) {
    super('DUPLICATE_REGISTRATION', `A different handler is already registered for type: ${taskType}`);
  }
}

export class UnknownTypeError extends TaskHiveError {
  constructor(taskType: string) {
    super('UNKNOWN_TYPE', `Unknown task type: ${taskType}`);
  }
}

export class HandlerError extends TaskHiveError {
  readonly taskType: string;

  constructor(taskType: string, cause: unknown) {
    super('HANDLER', errorMessage(cause), { cause });
    this.taskType = taskType;
  }
}

export class ConfigError extends TaskHiveError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
