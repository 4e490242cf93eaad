import {ZodError} from 'zod';

export type DbErrorCode = 'validation_error' | 'not_found' | 'unique_violation' | 'unexpected_error';

export class DbRepositoryError extends Error {
  public readonly code: DbErrorCode;

  public constructor(code: DbErrorCode, message: string, options?: {cause?: unknown}) {
    super(message, options);
    this.name = 'DbRepositoryError';
    this.code = code;
  }
}

export const isDbRepositoryError = (value: unknown): value is DbRepositoryError => value instanceof DbRepositoryError;

export const mapStoreError = (error: unknown): never => {
  if (error instanceof DbRepositoryError) {
    throw error;
  }

  if (error instanceof ZodError) {
    throw new DbRepositoryError('validation_error', error.issues[0]?.message ?? 'Invalid access token data', {
      cause: error
    });
  }

  throw new DbRepositoryError('unexpected_error', 'Unexpected access token store error', {cause: error});
};
