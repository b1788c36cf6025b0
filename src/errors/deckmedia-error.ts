/**
 * deckmedia typed error hierarchy
 *
 * Structured error classes with machine-readable codes and optional context.
 * Only InvalidRequestError aborts an export call; every other class is
 * recorded against the item it concerns.
 */

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'TRANSIENT'
  | 'RENDER_ERROR'
  | 'ASSEMBLY_ERROR'
  | 'UNSUPPORTED_FORMAT'
  | 'CYCLIC_CONTAINER'
  | 'DEPTH_LIMIT'
  | 'CANCELLED'
  | 'STORAGE_ERROR'
  | 'CONFIG_ERROR'
  | 'UNKNOWN_ERROR';

export class DeckMediaError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DeckMediaError';
    // Maintain proper prototype chain for instanceof checks in transpiled JS
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidRequestError extends DeckMediaError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_REQUEST', context);
    this.name = 'InvalidRequestError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends DeckMediaError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', context);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PermissionDeniedError extends DeckMediaError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PERMISSION_DENIED', context);
    this.name = 'PermissionDeniedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Network failure, timeout or rate limit. Retried by the remote call policy. */
export class TransientError extends DeckMediaError {
  constructor(
    message: string,
    public readonly retryAfterMs?: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'TRANSIENT', context);
    this.name = 'TransientError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RenderError extends DeckMediaError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'RENDER_ERROR', context);
    this.name = 'RenderError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AssemblyError extends DeckMediaError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ASSEMBLY_ERROR', context);
    this.name = 'AssemblyError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedFormatError extends DeckMediaError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'UNSUPPORTED_FORMAT', context);
    this.name = 'UnsupportedFormatError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class CyclicContainerError extends DeckMediaError {
  constructor(
    message: string,
    /** Container IDs from the first occurrence of the repeated container to the edge closing the loop. */
    public readonly cycle: string[],
    context?: Record<string, unknown>
  ) {
    super(message, 'CYCLIC_CONTAINER', context);
    this.name = 'CyclicContainerError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DepthLimitError extends DeckMediaError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DEPTH_LIMIT', context);
    this.name = 'DepthLimitError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class CancelledError extends DeckMediaError {
  constructor(message: string = 'Export cancelled', context?: Record<string, unknown>) {
    super(message, 'CANCELLED', context);
    this.name = 'CancelledError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class StorageError extends DeckMediaError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'STORAGE_ERROR', context);
    this.name = 'StorageError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends DeckMediaError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
