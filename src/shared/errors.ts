export type LedgerErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'NOT_FOUND'
  | 'INVALID_TASK'
  | 'PERSISTENCE_FAILURE';

export abstract class LedgerError extends Error {
  abstract readonly code: LedgerErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidConfigurationError extends LedgerError {
  readonly code = 'INVALID_CONFIGURATION';

  constructor(readonly issues: string[]) {
    super(`Invalid timer configuration: ${issues.join('; ')}`);
  }
}

export class TaskNotFoundError extends LedgerError {
  readonly code = 'NOT_FOUND';

  constructor(readonly taskId: string) {
    super(`Task not found: ${taskId}`);
  }
}

export class InvalidTaskError extends LedgerError {
  readonly code = 'INVALID_TASK';
}

export class PersistenceError extends LedgerError {
  readonly code = 'PERSISTENCE_FAILURE';

  constructor(readonly path: string, action: 'read' | 'write', cause: unknown) {
    super(`Could not ${action} ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}
