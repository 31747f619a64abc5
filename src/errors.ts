/**
 * Base class for errors raised inside the pipeline
 */
export class PipelineError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'PipelineError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Sender-side credential problem. Answered with 401, never retried.
 */
export class InvalidSignature extends PipelineError {
  constructor(message = 'invalid_signature') {
    super(message);
    this.name = 'InvalidSignature';
  }
}

/**
 * The queue did not accept the message; nothing was admitted.
 */
export class EnqueueFailure extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'EnqueueFailure';
  }
}

/**
 * Poison message. Retrying cannot fix it.
 */
export class MalformedMessage extends PipelineError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'MalformedMessage';
  }
}

/**
 * Storage write failed in a way the queue's redelivery is expected to resolve.
 */
export class TransientStorageFailure extends PipelineError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    cause?: unknown
  ) {
    super(message, cause);
    this.name = 'TransientStorageFailure';
  }
}

/**
 * The record could not be turned into a request at all. Redelivery would
 * fail the same way.
 */
export class PermanentStorageFailure extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'PermanentStorageFailure';
  }
}

export class InvalidCursorError extends PipelineError {
  constructor(cause?: unknown) {
    super('invalid_cursor', cause);
    this.name = 'InvalidCursorError';
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ConfigurationError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
