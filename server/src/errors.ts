/**
 * Error taxonomy shared by the store, router and transport.
 */

export type ErrorCode =
  | 'NotFound'
  | 'AlreadyExists'
  | 'InvalidArgument'
  | 'DurabilityDegraded'
  | 'TransportFailure'
  | 'Internal';

export class ListSyncError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ListSyncError';
    this.code = code;
  }
}

export function notFound(message: string): ListSyncError {
  return new ListSyncError('NotFound', message);
}

export function alreadyExists(message: string): ListSyncError {
  return new ListSyncError('AlreadyExists', message);
}

export function invalidArgument(message: string): ListSyncError {
  return new ListSyncError('InvalidArgument', message);
}

export function isListSyncError(error: unknown): error is ListSyncError {
  return error instanceof ListSyncError;
}

/** Best-effort message extraction for logging. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
