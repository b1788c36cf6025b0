/**
 * deckmedia error handler
 *
 * Converts thrown values to user-facing messages, decides retryability,
 * and normalizes unknown throwables into the typed hierarchy.
 */

import {
  DeckMediaError,
  NotFoundError,
  PermissionDeniedError,
  TransientError,
  CyclicContainerError,
  CancelledError,
  ConfigurationError,
} from './deckmedia-error.js';

export class ErrorHandler {
  /**
   * Convert any thrown value to a short user-facing message.
   */
  static toUserMessage(err: unknown): string {
    if (err instanceof TransientError) {
      if (err.retryAfterMs != null) {
        const seconds = Math.ceil(err.retryAfterMs / 1000);
        return `Remote service unavailable (${err.message}). Retry in ${seconds}s.`;
      }
      return `Remote service unavailable: ${err.message}`;
    }
    if (err instanceof PermissionDeniedError) {
      return `Permission denied: ${err.message}. Check the access token.`;
    }
    if (err instanceof NotFoundError) {
      return `Not found: ${err.message}`;
    }
    if (err instanceof CyclicContainerError) {
      return `Folder cycle detected: ${err.cycle.join(' -> ')}`;
    }
    if (err instanceof CancelledError) {
      return 'Export cancelled.';
    }
    if (err instanceof ConfigurationError) {
      return `Configuration error: ${err.message}. Run \`deckmedia config show\` to inspect settings.`;
    }
    if (err instanceof DeckMediaError) {
      return `${err.message} (${err.code})`;
    }
    if (err instanceof Error) {
      return err.message;
    }
    return 'An unexpected error occurred.';
  }

  /**
   * Returns true if the error is transient and worth retrying.
   */
  static isRetryable(err: unknown): boolean {
    return err instanceof TransientError;
  }

  /**
   * Normalize a thrown value. Library errors pass through unchanged.
   */
  static normalize(err: unknown, context?: Record<string, unknown>): DeckMediaError {
    if (err instanceof DeckMediaError) {
      return err;
    }
    return new DeckMediaError(
      err instanceof Error ? err.message : String(err),
      'UNKNOWN_ERROR',
      context
    );
  }

  /**
   * Wrap an async function with structured error handling.
   * Never throws — failures are returned as { error }.
   */
  static async wrap<T>(
    fn: () => Promise<T>,
    context?: Record<string, unknown>
  ): Promise<{ data?: T; error?: DeckMediaError }> {
    try {
      const data = await fn();
      return { data };
    } catch (err) {
      return { error: ErrorHandler.normalize(err, context) };
    }
  }
}
