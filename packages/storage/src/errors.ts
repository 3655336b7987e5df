/**
 * Storage error taxonomy
 *
 * Not-found conditions on existence checks, reads and downloads are not
 * errors: adapters map them to false / empty values. Provider errors that are
 * not listed here propagate unchanged.
 */

import { S3ServiceException } from '@aws-sdk/client-s3';

export const StorageErrorCodes = {
  CONFIGURATION: 'CONFIGURATION',
  CONFLICT: 'CONFLICT',
  NOT_FOUND: 'NOT_FOUND',
  CREDENTIALS: 'CREDENTIALS',
} as const;

export type StorageErrorCode = (typeof StorageErrorCodes)[keyof typeof StorageErrorCodes];

export class StorageError extends Error {
  constructor(
    public readonly code: StorageErrorCode,
    message: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = 'StorageError';
  }
}

/**
 * Required connection settings are absent, or an operation needs a setting
 * the backend was started without (region, role ARN)
 */
export class StorageConfigurationError extends StorageError {
  constructor(
    message: string,
    public readonly missing: string[] = [],
  ) {
    super(
      StorageErrorCodes.CONFIGURATION,
      message,
      missing.length > 0 ? `Set ${missing.join(', ')} in your .env file` : undefined,
    );
    this.name = 'StorageConfigurationError';
  }
}

export class ObjectConflictError extends StorageError {
  constructor(
    public readonly bucket: string,
    public readonly objectName: string,
  ) {
    super(
      StorageErrorCodes.CONFLICT,
      `Object name ${objectName} in bucket ${bucket} already taken`,
      'Pass force = true to overwrite the existing object',
    );
    this.name = 'ObjectConflictError';
  }
}

export class ObjectNotFoundError extends StorageError {
  constructor(
    public readonly bucket: string,
    public readonly objectName: string,
  ) {
    super(StorageErrorCodes.NOT_FOUND, `Object ${objectName} couldn't be found in bucket ${bucket}`);
    this.name = 'ObjectNotFoundError';
  }
}

export class CredentialIssuanceError extends StorageError {
  constructor(message: string) {
    super(StorageErrorCodes.CREDENTIALS, message);
    this.name = 'CredentialIssuanceError';
  }
}

const NOT_FOUND_NAMES = new Set(['NotFound', 'NoSuchKey', 'NoSuchBucket']);

/**
 * True for the provider's "does not exist" responses (HEAD requests carry no
 * error body, so a bare 404 counts as well)
 */
export function isNotFoundError(error: unknown): boolean {
  if (!(error instanceof S3ServiceException)) {
    return false;
  }
  return NOT_FOUND_NAMES.has(error.name) || error.$metadata.httpStatusCode === 404;
}
