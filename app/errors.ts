export type FieldIssue = {
  field: string;
  message: string;
};

/** Base class for failures that map onto an HTTP status. */
export class AppError extends Error {
  readonly status: number;

  constructor(status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

export class AuthError extends AppError {
  constructor(message = "invalid signature") {
    super(401, message);
  }
}

export class ValidationError extends AppError {
  readonly details: FieldIssue[];

  constructor(details: FieldIssue[], message = "validation failed") {
    super(422, message);
    this.details = details;
  }
}

export class NotReadyError extends AppError {
  constructor(message = "service not ready") {
    super(503, message);
  }
}

/** The storage engine could not complete a read or write. */
export class StorageUnavailable extends AppError {
  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(500, `storage unavailable during ${operation}: ${reason}`, { cause });
  }
}
