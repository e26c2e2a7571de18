export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public isOperational: boolean = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ServiceError extends Error {
  constructor(
    public service: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(`${service}.${operation} failed: ${originalError.message}`);
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, message, true);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Raised when a dataset the process cannot run without is missing or malformed.
 * Only thrown during startup.
 */
export class DatasetError extends Error {
  constructor(
    public dataset: string,
    message: string
  ) {
    super(`Dataset "${dataset}" unusable: ${message}`);
    Object.setPrototypeOf(this, DatasetError.prototype);
  }
}

/**
 * The reasoning backend did not answer within the configured timeout.
 * The turn fails; the session stays open.
 */
export class BackendTimeoutError extends ServiceError {
  constructor(operation: string, originalError: Error) {
    super('ReasoningBackend', operation, originalError, true);
    Object.setPrototypeOf(this, BackendTimeoutError.prototype);
  }
}

export class BackendUnavailableError extends ServiceError {
  constructor(operation: string, originalError: Error, retryable: boolean = true) {
    super('ReasoningBackend', operation, originalError, retryable);
    Object.setPrototypeOf(this, BackendUnavailableError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
