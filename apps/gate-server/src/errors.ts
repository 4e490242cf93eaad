import {isDbRepositoryError, type DbRepositoryError} from '@token-gate/db'
import {ZodError} from 'zod'

export type ErrorStatus = 400 | 401 | 404 | 409 | 413 | 415 | 500 | 503

export class AppError extends Error {
  public readonly code: string
  public readonly status: ErrorStatus

  public constructor({code, message, status}: {code: string; message: string; status: ErrorStatus}) {
    super(message)
    this.name = 'AppError'
    this.code = code
    this.status = status
  }
}

export const badRequest = (code: string, message: string) => new AppError({code, message, status: 400})

export const unauthorized = (code: string, message: string) => new AppError({code, message, status: 401})

export const notFound = (code: string, message: string) => new AppError({code, message, status: 404})

export const conflict = (code: string, message: string) => new AppError({code, message, status: 409})

export const payloadTooLarge = (code: string, message: string) => new AppError({code, message, status: 413})

export const unsupportedMediaType = (code: string, message: string) => new AppError({code, message, status: 415})

export const internal = (code: string, message: string) => new AppError({code, message, status: 500})

export const isAppError = (value: unknown): value is AppError => value instanceof AppError

const fromRepositoryError = (error: DbRepositoryError): AppError => {
  switch (error.code) {
    case 'validation_error':
      return badRequest('validation_error', error.message)
    case 'not_found':
      return notFound('not_found', error.message)
    case 'unique_violation':
      return conflict('unique_violation', error.message)
    case 'unexpected_error':
      return internal('internal_error', 'Internal server error')
  }
}

/**
 * Maps anything thrown while handling a request onto the HTTP error it should
 * produce. Unknown errors become a generic 500.
 */
export const toAppError = (error: unknown): AppError => {
  if (isAppError(error)) {
    return error
  }

  if (isDbRepositoryError(error)) {
    return fromRepositoryError(error)
  }

  if (error instanceof ZodError) {
    return badRequest('validation_error', error.issues.map(issue => issue.message).join('; '))
  }

  return internal('internal_error', 'Internal server error')
}
