// Mapping of B2 API failures and transport errors onto the storage taxonomy.

import {
  StorageAccessDeniedError,
  StorageAccessExpiredError,
  StorageCancelledError,
  StorageConnectionClosedError,
  StorageConnectionFailedError,
  StorageInternalError,
  StorageInvalidDataError,
  StorageNotFoundError,
  StorageOtherError,
} from '../../errors.js';
import type { StorageError } from '../../errors.js';
import type { ObjectPath } from '../../object-path.js';

import { ErrorResponseSchema } from './schemas.js';

const CLOSED_CODES = new Set(['ECONNRESET', 'EPIPE', 'ECONNABORTED', 'UND_ERR_SOCKET', 'UND_ERR_CLOSED']);

const FAILED_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function networkCode(error: unknown): string | undefined {
  // fetch reports network failures as a TypeError whose cause carries the code.
  const candidates = [error, error instanceof Error ? error.cause : undefined];
  for (const candidate of candidates) {
    if (candidate instanceof Error && 'code' in candidate && typeof candidate.code === 'string') {
      return candidate.code;
    }
  }
  return undefined;
}

/**
 * Classify a failed API response from its body.
 *
 * @param method - B2 method name, e.g. `b2_list_buckets`
 * @param path - the object path the call was made for
 * @param body - raw response text
 */
export function classifyApiError(method: string, path: ObjectPath, body: string): StorageError {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    return new StorageInvalidDataError(`Unable to parse error response from ${method}`, {
      cause: error,
    });
  }

  const parsed = ErrorResponseSchema.safeParse(json);
  if (!parsed.success) {
    return new StorageInvalidDataError(`Unable to parse error response from ${method}`, {
      cause: parsed.error,
    });
  }

  const { status, code, message } = parsed.data;

  if (method === 'b2_authorize_account' && status === 401 && code === 'bad_auth_token') {
    return new StorageAccessDeniedError('The application key id or key were not recognized');
  }

  switch (status) {
    case 400:
      if (code === 'bad_request' || code === 'out_of_range') {
        return new StorageInternalError(message);
      }
      if (code === 'invalid_bucket_id') {
        return new StorageNotFoundError(path.toString());
      }
      break;
    case 401:
      if (code === 'unauthorized') {
        return new StorageAccessDeniedError('The application key id or key were not recognized');
      }
      if (code === 'bad_auth_token') {
        return new StorageAccessExpiredError('The authentication token is invalid');
      }
      if (code === 'expired_auth_token') {
        return new StorageAccessExpiredError('The authentication token has expired');
      }
      if (code === 'unsupported') {
        return new StorageInternalError(message);
      }
      break;
    case 404:
      if (code === 'not_found') {
        return new StorageNotFoundError(path.toString());
      }
      break;
    case 503:
      return new StorageConnectionFailedError(message);
  }

  return new StorageOtherError(`Unknown B2 API failure ${status}: ${code}, ${message}`);
}

/**
 * Classify an error thrown by fetch itself.
 *
 * @param timedOut - whether the request's own timeout fired
 */
export function classifyTransportError(error: unknown, label: string, timedOut: boolean): StorageError {
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return timedOut
      ? new StorageConnectionFailedError(`${label} timed out`, { cause: error })
      : new StorageCancelledError(label, { cause: error });
  }

  const code = networkCode(error);
  if (code !== undefined && CLOSED_CODES.has(code)) {
    return new StorageConnectionClosedError(`${label} (${code})`, { cause: error });
  }
  if (code !== undefined && FAILED_CODES.has(code)) {
    return new StorageConnectionFailedError(`${label} (${code})`, { cause: error });
  }

  const detail = error instanceof Error ? error.message : String(error);
  return new StorageConnectionFailedError(`${label}: ${detail}`, { cause: error });
}
