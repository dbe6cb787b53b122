export type DialogueErrorCode =
  | 'INVALID_INPUT'
  | 'SESSION_NOT_FOUND'
  | 'SESSION_EXPIRED'
  | 'SESSION_CONFLICT'
  | 'STORAGE_ERROR'
  | 'CONFIG_ERROR';

/**
 * Base class for every error the dialogue core raises on purpose.
 * `retriable` tells callers whether resubmitting the same request
 * (with the same idempotency key) can succeed.
 */
export class DialogueError extends Error {
  constructor(
    message: string,
    readonly code: DialogueErrorCode,
    readonly retriable: boolean = false,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Empty or whitespace-only input. Raised before any lookup or mutation. */
export class InvalidInputError extends DialogueError {
  constructor(message = 'input_text must not be empty') {
    super(message, 'INVALID_INPUT');
  }
}

export class SessionNotFoundError extends DialogueError {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} not found`, 'SESSION_NOT_FOUND');
  }
}

/** The session was idle past its timeout and has been moved to TIMEOUT. */
export class SessionExpiredError extends DialogueError {
  constructor(readonly sessionId: string, readonly idleMs: number) {
    super(`Session ${sessionId} expired after ${idleMs}ms idle`, 'SESSION_EXPIRED');
  }
}

/** Optimistic version check failed; the caller reloads and retries. */
export class SessionConflictError extends DialogueError {
  constructor(readonly sessionId: string, readonly expectedVersion: number) {
    super(`Session ${sessionId} changed since version ${expectedVersion}`, 'SESSION_CONFLICT', true);
  }
}

export class StorageError extends DialogueError {
  constructor(message: string, cause?: unknown) {
    super(message, 'STORAGE_ERROR', true, { cause });
  }
}

export class ConfigError extends DialogueError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
  }
}

export function isDialogueError(err: unknown): err is DialogueError {
  return err instanceof DialogueError;
}
