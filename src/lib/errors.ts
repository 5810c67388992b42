/**
 * Application errors
 *
 * Services throw AppError with one of a closed set of kinds; route handlers
 * turn them into the JSON envelope with a matching status code.
 */

export type ErrorKind =
  | 'NOT_FOUND'
  | 'FORBIDDEN'
  | 'VALIDATION'
  | 'CONFLICT'
  | 'UNAUTHORIZED'
  | 'REMOTE_SERVICE'
  | 'IO'
  | 'CONFIG'
  | 'INTERNAL'

export class AppError extends Error {
  readonly kind: ErrorKind

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'AppError'
    this.kind = kind
  }
}

export const notFound = (message: string) => new AppError('NOT_FOUND', message)
export const forbidden = (message: string) => new AppError('FORBIDDEN', message)
export const validationError = (message: string) => new AppError('VALIDATION', message)
export const conflict = (message: string) => new AppError('CONFLICT', message)

export function remoteServiceError(message: string, cause?: unknown) {
  return new AppError('REMOTE_SERVICE', message, { cause })
}

export function ioError(message: string, cause?: unknown) {
  return new AppError('IO', message, { cause })
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

// HTTP status for each error kind
export const STATUS_BY_KIND: Record<ErrorKind, number> = {
  NOT_FOUND: 404,
  FORBIDDEN: 403,
  VALIDATION: 400,
  CONFLICT: 409,
  UNAUTHORIZED: 401,
  REMOTE_SERVICE: 502,
  IO: 502,
  CONFIG: 503,
  INTERNAL: 500,
}

export function errorKindOf(error: unknown): ErrorKind {
  return isAppError(error) ? error.kind : 'INTERNAL'
}

export function errorMessageOf(error: unknown): string {
  if (error instanceof Error && error.message) return error.message
  return 'Unknown error'
}

// Message safe to send to clients; internal failures carry database or runtime details
export function publicErrorMessage(error: unknown): string {
  return errorKindOf(error) === 'INTERNAL' ? 'Internal server error' : errorMessageOf(error)
}
