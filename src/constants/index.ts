// Separator between a model's name and its variant token in a model directory name.
export const VARIANT_SEPARATOR = '-';

export const DIGEST_ALGORITHM = 'sha512';
export const DIGEST_HEX_LENGTH = 128;

// models.library_id is a PostgreSQL integer column.
export const MAX_LIBRARY_ID = 2_147_483_647;

export const ErrorCodes = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  PATH_FORMAT_ERROR: 'PATH_FORMAT_ERROR',
  CONFIG_ERROR: 'CONFIG_ERROR',
  FILESYSTEM_ERROR: 'FILESYSTEM_ERROR',
  DATABASE_ERROR: 'DATABASE_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
