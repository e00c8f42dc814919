import { z } from 'zod';

export type ErrorKind =
  | 'validation'
  | 'not_found'
  | 'conflict'
  | 'storage'
  | 'configuration'
  | 'timeout'
  | 'internal';

export interface ErrorPayload {
  error: {
    kind: ErrorKind;
    message: string;
    details?: unknown;
  };
}

export class ChronologError extends Error {
  readonly kind: ErrorKind;
  readonly details?: unknown;

  constructor(kind: ErrorKind, message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChronologError';
    this.kind = kind;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toPayload(): ErrorPayload {
    const payload: ErrorPayload = { error: { kind: this.kind, message: this.message } };
    if (this.details !== undefined) {
      payload.error.details = this.details;
    }
    return payload;
  }
}

export class ValidationError extends ChronologError {
  constructor(message: string, details?: unknown) {
    super('validation', message, details);
    this.name = 'ValidationError';
  }

  static fromZod(error: z.ZodError, message = 'Invalid arguments'): ValidationError {
    return new ValidationError(
      message,
      error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }
}

export class NotFoundError extends ChronologError {
  constructor(entity: 'Activity' | 'Reminder', id: string) {
    super('not_found', `${entity} with ID ${id} not found`, { entity, id });
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends ChronologError {
  constructor(message: string, details?: unknown) {
    super('conflict', message, details);
    this.name = 'ConflictError';
  }
}

export class StorageError extends ChronologError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super('storage', message, { path, cause: describeCause(cause) }, { cause });
    this.name = 'StorageError';
    this.path = path;
  }
}

export class ConfigurationError extends ChronologError {
  constructor(message: string, details?: unknown) {
    super('configuration', message, details);
    this.name = 'ConfigurationError';
  }
}

export class TimeoutError extends ChronologError {
  constructor(operation: string, timeoutMs: number) {
    super('timeout', `${operation} timed out after ${timeoutMs / 1000} seconds`, { operation, timeoutMs });
    this.name = 'TimeoutError';
  }
}

function describeCause(cause: unknown): string | undefined {
  if (cause === undefined) return undefined;
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function normalizeError(error: unknown): ChronologError {
  if (error instanceof ChronologError) {
    return error;
  }
  if (error instanceof z.ZodError) {
    return ValidationError.fromZod(error);
  }
  if (error instanceof Error) {
    return new ChronologError('internal', error.message, undefined, { cause: error });
  }
  return new ChronologError('internal', 'An unexpected error occurred');
}
