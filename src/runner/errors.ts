export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Base for failures attributed to a named action or handler.
 * The underlying failure is kept as `cause`.
 */
export class ActionError extends Error {
  constructor(
    public readonly taskName: string,
    cause: unknown,
    message: string = `${taskName}: ${errorMessage(cause)}`
  ) {
    super(message, { cause });
    this.name = 'ActionError';
  }
}

/**
 * The current state could not be determined. Fatal.
 */
export class CheckError extends ActionError {
  constructor(taskName: string, cause: unknown) {
    super(taskName, cause, `Check failed for "${taskName}": ${errorMessage(cause)}`);
    this.name = 'CheckError';
  }
}

/**
 * Mutating the host failed. Fatal.
 */
export class ApplyError extends ActionError {
  constructor(taskName: string, cause: unknown) {
    super(taskName, cause, `Apply failed for "${taskName}": ${errorMessage(cause)}`);
    this.name = 'ApplyError';
  }
}

/**
 * A notified handler failed. Reported, never rolled back.
 */
export class HandlerError extends ActionError {
  constructor(
    taskName: string,
    public readonly phase: 'check' | 'apply',
    cause: unknown
  ) {
    super(taskName, cause, `Handler "${taskName}" failed during ${phase}: ${errorMessage(cause)}`);
    this.name = 'HandlerError';
  }
}

/**
 * A task notifies a handler that is not registered.
 */
export class UnknownHandlerError extends Error {
  constructor(
    public readonly taskName: string,
    public readonly handlerName: string
  ) {
    super(`"${taskName}" notifies unknown handler "${handlerName}"`);
    this.name = 'UnknownHandlerError';
  }
}
