export type ErrorCode =
  | 'validation_error'
  | 'state_error'
  | 'stream_error'
  | 'content_rejected'
  | 'timeout_error'
  | 'resource_error';

export class RuntimeError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed or unsupported control message. The connection stays open. */
export class ValidationError extends RuntimeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('validation_error', message, options);
  }
}

/** Operation not valid in the current connection state. Nothing is mutated. */
export class StateError extends RuntimeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('state_error', message, options);
  }
}

export class StreamError extends RuntimeError {
  constructor(message: string, options?: { cause?: unknown; code?: 'stream_error' | 'content_rejected' }) {
    super(options?.code ?? 'stream_error', message, options);
  }
}

export class ContentRejectedError extends StreamError {
  constructor(message = 'content is not child-safe') {
    super(message, { code: 'content_rejected' });
  }
}

export class TimeoutError extends RuntimeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('timeout_error', message, options);
  }
}

/** Session store failure. */
export class ResourceError extends RuntimeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('resource_error', message, options);
  }
}

export function errorCodeOf(error: unknown, fallback: ErrorCode = 'stream_error'): ErrorCode {
  return error instanceof RuntimeError ? error.code : fallback;
}

export function errorMessageOf(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'unknown error';
}

/** Rebuilds a typed error from a recorded code, e.g. a saga's stored failure. */
export function errorFromCode(code: ErrorCode, message: string): RuntimeError {
  switch (code) {
    case 'validation_error':
      return new ValidationError(message);
    case 'state_error':
      return new StateError(message);
    case 'content_rejected':
      return new ContentRejectedError(message);
    case 'timeout_error':
      return new TimeoutError(message);
    case 'resource_error':
      return new ResourceError(message);
    case 'stream_error':
      return new StreamError(message);
  }
}
