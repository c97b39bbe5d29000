/**
 * Error classes for engine operations
 */

/**
 * Base error class for engine errors
 */
export class EngineError extends Error {
  constructor(message: string, public readonly details?: string) {
    super(message);
    this.name = 'EngineError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EngineError);
    }
  }
}

/**
 * Engine process could not be started, exited, or stopped accepting commands
 */
export class EngineUnavailableError extends EngineError {
  constructor(
    public readonly enginePath: string,
    cause?: Error | string
  ) {
    const reason = cause instanceof Error ? cause.message : cause;
    super(`Engine at '${enginePath}' is unavailable${reason ? `: ${reason}` : ''}`, reason);
    this.name = 'EngineUnavailableError';
  }
}

/**
 * Engine did not answer a command in time
 */
export class EngineTimeoutError extends EngineError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`Engine operation '${operation}' timed out after ${timeoutMs}ms`);
    this.name = 'EngineTimeoutError';
  }
}

/**
 * Engine answered, but not with a usable analysis
 */
export class EngineResponseError extends EngineError {
  constructor(message: string, public readonly fen?: string) {
    super(message);
    this.name = 'EngineResponseError';
  }
}
