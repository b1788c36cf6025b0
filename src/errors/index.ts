/**
 * deckmedia errors
 *
 * Barrel export for the typed error hierarchy and error handler.
 */

export {
  DeckMediaError,
  InvalidRequestError,
  NotFoundError,
  PermissionDeniedError,
  TransientError,
  RenderError,
  AssemblyError,
  UnsupportedFormatError,
  CyclicContainerError,
  DepthLimitError,
  CancelledError,
  StorageError,
  ConfigurationError,
} from './deckmedia-error.js';
export type { ErrorCode } from './deckmedia-error.js';

export { ErrorHandler } from './error-handler.js';
