import type { FastifyError, FastifyPluginCallback, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';

import { reportServerError } from '../instrument.js';
import { storageErrorKind, transferErrorSide } from '../storage/errors.js';
import type { TransferSide } from '../storage/errors.js';

interface ErrorHandlerOptions {
  isDev: boolean;
}

interface ErrorBody {
  code: string;
  message: string;
  statusCode: number;
  /** Which end of a write failed, for TRANSFER_* errors */
  side?: TransferSide;
  stack?: string;
}

interface ErrorResponse {
  error: ErrorBody;
  requestId: string;
  timestamp: string;
}

function envelope(request: FastifyRequest, error: ErrorBody): ErrorResponse {
  return { error, requestId: request.id, timestamp: new Date().toISOString() };
}

const errorHandler: FastifyPluginCallback<ErrorHandlerOptions> = (fastify, options, done) => {
  const { isDev } = options;

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    const code = error.code ?? 'INTERNAL_ERROR';
    const side = transferErrorSide(error);

    request.log[statusCode >= 500 ? 'error' : 'warn'](
      { err: error, code, statusCode, kind: storageErrorKind(error) ?? storageErrorKind(error.cause), side },
      'Request error'
    );

    if (statusCode >= 500) {
      reportServerError(error, { requestId: request.id, url: request.url, method: request.method });
    }

    const body: ErrorBody = {
      code,
      message: isDev ? error.message : sanitizeMessage(error.message, code, statusCode),
      statusCode,
      ...(side && { side }),
      ...(isDev && error.stack && { stack: error.stack }),
    };
    reply.status(statusCode).send(envelope(request, body));
  });

  fastify.setNotFoundHandler((request, reply) => {
    request.log.warn({ method: request.method, url: request.url }, 'Route not found');
    reply.status(404).send(
      envelope(request, {
        code: 'NOT_FOUND',
        message: `Route ${request.method}:${request.url} not found`,
        statusCode: 404,
      })
    );
  });

  done();
};

/** Codes whose messages may carry paths, hosts or OS details from the storage side. */
const INTERNAL_CODES = new Set([
  'INTERNAL_ERROR',
  'STORAGE_INTERNAL_ERROR',
  'STORAGE_OTHER_ERROR',
  'STORAGE_INVALID_SETTINGS',
  'TRANSFER_TARGET_ERROR',
]);

export function sanitizeMessage(message: string, code: string, statusCode: number): string {
  if (statusCode === 429) {
    return message;
  }
  if (INTERNAL_CODES.has(code) || code.startsWith('SERVER_')) {
    return 'An internal error occurred';
  }
  // Everything else is about the request itself (bad path, missing object, ...)
  return message;
}

export const errorHandlerPlugin = fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});
