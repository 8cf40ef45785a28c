/**
 * Stable machine-readable codes carried by every queue error.
 */
export enum QueueErrorCode {
  /** The store failed its health check */
  STORE_UNAVAILABLE = "E_STORE_UNAVAILABLE",
  /** A store operation exceeded its deadline */
  STORE_TIMEOUT = "E_STORE_TIMEOUT",
  /** A store operation failed */
  STORE_FAILED = "E_STORE_FAILED",
  /** A payload or job record could not be encoded or decoded */
  SERIALIZATION = "E_SERIALIZATION",
  /** A job with the caller-supplied id already exists */
  DUPLICATE_JOB = "E_DUPLICATE_JOB",
  /** The job id is unknown or its record expired */
  NOT_FOUND = "E_NOT_FOUND",
  /** The job did not reach a terminal status in time */
  RESULT_TIMEOUT = "E_RESULT_TIMEOUT",
  /** The handler ran past the job timeout */
  HANDLER_TIMEOUT = "E_HANDLER_TIMEOUT",
  /** The handler threw or rejected */
  HANDLER_FAILED = "E_HANDLER_FAILED",
  /** The global registry was initialized twice */
  ALREADY_INITIALIZED = "E_ALREADY_INITIALIZED",
  /** The global registry was used before init */
  NOT_INITIALIZED = "E_NOT_INITIALIZED",
}

/**
 * Base class for every error raised by the queue engine.
 */
export class QueueError extends Error {
  name = "QueueError";
  readonly code: QueueErrorCode;

  constructor(code: QueueErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
  }
}

export class StoreUnavailableError extends QueueError {
  name = "StoreUnavailableError";

  constructor(message = "Store is not available.") {
    super(QueueErrorCode.STORE_UNAVAILABLE, message);
  }
}

export class StoreTimeoutError extends QueueError {
  name = "StoreTimeoutError";

  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(
      QueueErrorCode.STORE_TIMEOUT,
      `Store operation '${operation}' timed out after ${timeoutMs}ms`,
    );
  }
}

export class StoreError extends QueueError {
  name = "StoreError";

  constructor(message: string, cause?: unknown) {
    super(QueueErrorCode.STORE_FAILED, message, { cause });
  }
}

export class SerializationError extends QueueError {
  name = "SerializationError";

  constructor(message: string, cause?: unknown) {
    super(QueueErrorCode.SERIALIZATION, message, { cause });
  }
}

export class JobNotFoundError extends QueueError {
  name = "JobNotFoundError";

  constructor(readonly jobId: string) {
    super(QueueErrorCode.NOT_FOUND, `Job ${jobId} was not found`);
  }
}

export class DuplicateJobError extends QueueError {
  name = "DuplicateJobError";

  constructor(readonly jobId: string) {
    super(QueueErrorCode.DUPLICATE_JOB, `Job with id ${jobId} already exists.`);
  }
}

export class JobResultTimeoutError extends QueueError {
  name = "JobResultTimeoutError";

  constructor(
    readonly jobId: string,
    readonly timeoutMs: number,
  ) {
    super(
      QueueErrorCode.RESULT_TIMEOUT,
      `Job ${jobId} did not finish within ${timeoutMs}ms`,
    );
  }
}

export class HandlerTimeoutError extends QueueError {
  name = "HandlerTimeoutError";

  constructor(
    readonly jobId: string,
    readonly timeoutMs: number,
  ) {
    super(
      QueueErrorCode.HANDLER_TIMEOUT,
      `Job ${jobId} timed out after ${timeoutMs}ms`,
    );
  }
}

export class HandlerError extends QueueError {
  name = "HandlerError";

  constructor(
    readonly jobId: string,
    cause: unknown,
  ) {
    super(QueueErrorCode.HANDLER_FAILED, `Handler failed for job ${jobId}`, {
      cause,
    });
  }
}

export class AlreadyInitializedError extends QueueError {
  name = "AlreadyInitializedError";

  constructor() {
    super(
      QueueErrorCode.ALREADY_INITIALIZED,
      "Queue registry already initialized",
    );
  }
}

export class NotInitializedError extends QueueError {
  name = "NotInitializedError";

  constructor() {
    super(
      QueueErrorCode.NOT_INITIALIZED,
      "Queue registry not initialized. Call QueueRegistry.init() first.",
    );
  }
}
