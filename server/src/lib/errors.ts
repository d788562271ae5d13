export type AppErrorStatus = 400 | 404 | 409 | 500 | 502 | 503;

export interface AppErrorOptions {
  message: string;
  statusCode: AppErrorStatus;
  code: string;
  details?: Record<string, unknown>;
}

export class AppError extends Error {
  public readonly statusCode: AppErrorStatus;
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor({ message, statusCode, code, details }: AppErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found', details?: Record<string, unknown>) {
    super({ message, statusCode: 404, code: 'NOT_FOUND', details });
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Validation error', details?: Record<string, unknown>) {
    super({ message, statusCode: 400, code: 'INVALID_ARGUMENT', details });
  }
}

export class ConflictError extends AppError {
  constructor(message = 'Conflict', details?: Record<string, unknown>) {
    super({ message, statusCode: 409, code: 'CONFLICT', details });
  }
}

/**
 * The retrieval service could not be reached (503) or answered with an error (502).
 */
export class UpstreamUnavailableError extends AppError {
  public readonly service: string;

  constructor(
    message = 'Retrieval service unavailable',
    options: { service?: string; statusCode?: 502 | 503; details?: Record<string, unknown> } = {}
  ) {
    super({
      message,
      statusCode: options.statusCode ?? 503,
      code: 'UPSTREAM_UNAVAILABLE',
      details: options.details,
    });
    this.service = options.service ?? 'rag-service';
  }
}

export function toErrorMessage(error: unknown, fallback = 'Unknown error'): string {
  if (error instanceof Error) {
    return error.message;
  }

  return typeof error === 'string' ? error : fallback;
}
