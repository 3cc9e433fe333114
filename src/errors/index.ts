import createError from '@fastify/error';

// Configuration errors (CONFIG_*)
export const ConfigInvalidError = createError<[string]>(
  'CONFIG_INVALID',
  'Invalid configuration: %s',
  500
);

export const ConfigMissingError = createError<[string]>(
  'CONFIG_MISSING',
  'Missing configuration file: %s',
  500
);

export const ConfigParseError = createError<[string]>(
  'CONFIG_PARSE_ERROR',
  'Failed to parse configuration: %s',
  500
);

// Server errors (SERVER_*)
export const ServerStartError = createError<[string]>(
  'SERVER_START_ERROR',
  'Failed to start server: %s',
  500
);

// Storage and transfer errors (STORAGE_*, TRANSFER_*) - re-exported from the storage core
export {
  StorageNotFoundError,
  StorageInvalidPathError,
  StorageInvalidSettingsError,
  StorageInvalidDataError,
  StorageAccessDeniedError,
  StorageAccessExpiredError,
  StorageConnectionFailedError,
  StorageConnectionClosedError,
  StorageCancelledError,
  StorageInternalError,
  StorageOtherError,
  StorageNotSupportedError,
  TransferSourceError,
  TransferTargetError,
} from '../storage/errors.js';

// Upload errors (UPLOAD_*)
export const UploadMissingFileError = createError<[string]>(
  'UPLOAD_MISSING_FILE',
  'No file in upload request: %s',
  400
);

export const UploadTooLargeError = createError<[number]>(
  'UPLOAD_TOO_LARGE',
  'Upload exceeds the limit of %d bytes',
  413
);
