// Storage error taxonomy.
//
// Every failure that leaves the storage core is one of these constructors.
// Status codes are what the HTTP gateway answers with; the `code` doubles as
// the machine-readable kind.

import createError from '@fastify/error';
import type { FastifyError } from 'fastify';

type ErrorArgs = [string, { cause: unknown }?];

export const StorageNotFoundError = createError<ErrorArgs>(
  'STORAGE_NOT_FOUND',
  'Object not found: %s',
  404
);

export const StorageInvalidPathError = createError<ErrorArgs>(
  'STORAGE_INVALID_PATH',
  'Invalid path: %s',
  400
);

export const StorageInvalidSettingsError = createError<ErrorArgs>(
  'STORAGE_INVALID_SETTINGS',
  'Invalid storage settings: %s',
  500
);

export const StorageInvalidDataError = createError<ErrorArgs>(
  'STORAGE_INVALID_DATA',
  'Invalid data: %s',
  502
);

export const StorageAccessDeniedError = createError<ErrorArgs>(
  'STORAGE_ACCESS_DENIED',
  'Access denied: %s',
  403
);

export const StorageAccessExpiredError = createError<ErrorArgs>(
  'STORAGE_ACCESS_EXPIRED',
  'Access expired: %s',
  401
);

export const StorageConnectionFailedError = createError<ErrorArgs>(
  'STORAGE_CONNECTION_FAILED',
  'Connection failed: %s',
  503
);

export const StorageConnectionClosedError = createError<ErrorArgs>(
  'STORAGE_CONNECTION_CLOSED',
  'Connection closed: %s',
  503
);

export const StorageCancelledError = createError<ErrorArgs>(
  'STORAGE_CANCELLED',
  'Operation cancelled: %s',
  499
);

export const StorageInternalError = createError<ErrorArgs>(
  'STORAGE_INTERNAL_ERROR',
  'Internal storage error: %s',
  500
);

export const StorageOtherError = createError<ErrorArgs>(
  'STORAGE_OTHER_ERROR',
  'Storage error: %s',
  500
);

export const StorageNotSupportedError = createError<ErrorArgs>(
  'STORAGE_NOT_SUPPORTED',
  'Not supported: %s',
  501
);

// Write failures (TRANSFER_*): which side of the copy broke.

/** The caller's input stream failed while being written. */
export const TransferSourceError = createError<ErrorArgs>(
  'TRANSFER_SOURCE_ERROR',
  'Source stream failed: %s',
  400
);

/** The storage backend failed while writing. */
export const TransferTargetError = createError<ErrorArgs>(
  'TRANSFER_TARGET_ERROR',
  'Storage target failed: %s',
  500
);

export type StorageErrorKind =
  | 'NotFound'
  | 'InvalidPath'
  | 'InvalidSettings'
  | 'InvalidData'
  | 'AccessDenied'
  | 'AccessExpired'
  | 'ConnectionFailed'
  | 'ConnectionClosed'
  | 'Cancelled'
  | 'InternalError'
  | 'OtherError'
  | 'NotSupported';

export type StorageError = FastifyError;

const CONSTRUCTORS = {
  NotFound: StorageNotFoundError,
  InvalidPath: StorageInvalidPathError,
  InvalidSettings: StorageInvalidSettingsError,
  InvalidData: StorageInvalidDataError,
  AccessDenied: StorageAccessDeniedError,
  AccessExpired: StorageAccessExpiredError,
  ConnectionFailed: StorageConnectionFailedError,
  ConnectionClosed: StorageConnectionClosedError,
  Cancelled: StorageCancelledError,
  InternalError: StorageInternalError,
  OtherError: StorageOtherError,
  NotSupported: StorageNotSupportedError,
} satisfies Record<StorageErrorKind, unknown>;

const KIND_BY_CODE = new Map<string, StorageErrorKind>([
  ['STORAGE_NOT_FOUND', 'NotFound'],
  ['STORAGE_INVALID_PATH', 'InvalidPath'],
  ['STORAGE_INVALID_SETTINGS', 'InvalidSettings'],
  ['STORAGE_INVALID_DATA', 'InvalidData'],
  ['STORAGE_ACCESS_DENIED', 'AccessDenied'],
  ['STORAGE_ACCESS_EXPIRED', 'AccessExpired'],
  ['STORAGE_CONNECTION_FAILED', 'ConnectionFailed'],
  ['STORAGE_CONNECTION_CLOSED', 'ConnectionClosed'],
  ['STORAGE_CANCELLED', 'Cancelled'],
  ['STORAGE_INTERNAL_ERROR', 'InternalError'],
  ['STORAGE_OTHER_ERROR', 'OtherError'],
  ['STORAGE_NOT_SUPPORTED', 'NotSupported'],
]);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Build a storage error of the given kind. */
export function storageError(
  kind: StorageErrorKind,
  message: string,
  cause?: unknown
): StorageError {
  const Ctor = CONSTRUCTORS[kind];
  return cause === undefined ? new Ctor(message) : new Ctor(message, { cause });
}

/** The kind of a storage error, or undefined for anything else. */
export function storageErrorKind(error: unknown): StorageErrorKind | undefined {
  const code = errorCode(error);
  return code === undefined ? undefined : KIND_BY_CODE.get(code);
}

export function isStorageError(error: unknown): error is StorageError {
  return storageErrorKind(error) !== undefined;
}

/**
 * Pass storage errors through unchanged and wrap anything else as an
 * OtherError carrying the original as its cause.
 */
export function toStorageError(error: unknown, context: string): StorageError {
  if (isStorageError(error)) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new StorageOtherError(`${context}: ${detail}`, { cause: error });
}

export type TransferError = FastifyError;

export type TransferSide = 'source' | 'target';

/** Which side of a write failed, or undefined if `error` is not a transfer error. */
export function transferErrorSide(error: unknown): TransferSide | undefined {
  switch (errorCode(error)) {
    case 'TRANSFER_SOURCE_ERROR':
      return 'source';
    case 'TRANSFER_TARGET_ERROR':
      return 'target';
    default:
      return undefined;
  }
}

export function sourceError(error: unknown): TransferError {
  const cause = toStorageError(error, 'source stream');
  return new TransferSourceError(cause.message, { cause });
}

export function targetError(error: unknown, context: string): TransferError {
  const cause = toStorageError(error, context);
  return new TransferTargetError(cause.message, { cause });
}
