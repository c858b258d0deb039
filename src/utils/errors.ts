import { ErrorCodes, type ErrorCode } from '../constants/index.js';

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public field?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function validationError(message: string, field?: string): AppError {
  return new AppError(ErrorCodes.VALIDATION_ERROR, message, field);
}

export function pathFormatError(message: string, field?: string): AppError {
  return new AppError(ErrorCodes.PATH_FORMAT_ERROR, message, field);
}

export function configError(message: string, field?: string): AppError {
  return new AppError(ErrorCodes.CONFIG_ERROR, message, field);
}

export function filesystemError(message: string, cause: unknown): AppError {
  return new AppError(
    ErrorCodes.FILESYSTEM_ERROR,
    `${message}: ${describeCause(cause)}`,
    undefined,
    { cause },
  );
}

export function databaseError(message: string, cause: unknown): AppError {
  return new AppError(
    ErrorCodes.DATABASE_ERROR,
    `${message}: ${describeCause(cause)}`,
    undefined,
    { cause },
  );
}

export function internalError(message: string): AppError {
  return new AppError(ErrorCodes.INTERNAL_ERROR, message);
}
