import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

interface RequestLoggerOptions {
  isDev: boolean;
}

const requestLogger: FastifyPluginCallback<RequestLoggerOptions> = (fastify, options, done) => {
  const { isDev } = options;

  // Log incoming requests
  fastify.addHook('onRequest', async (request) => {
    if (request.url === '/health') {
      return;
    }

    const logData: Record<string, unknown> = {
      method: request.method,
      url: request.url,
      requestId: request.id,
      contentLength: request.headers['content-length'],
    };

    // User agent only in dev; uploads and downloads are logged by size
    if (isDev) {
      logData.userAgent = request.headers['user-agent'];
    }

    request.log.info(logData, 'Incoming request');
  });

  // Log completed responses
  fastify.addHook('onResponse', async (request, reply) => {
    const logData: Record<string, unknown> = {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
      requestId: request.id,
      contentLength: reply.getHeader('content-length'),
    };

    // Log at appropriate level based on status code
    if (request.url === '/health' && reply.statusCode < 400) {
      request.log.debug(logData, 'Health check completed');
    } else if (reply.statusCode >= 500) {
      request.log.error(logData, 'Request completed with server error');
    } else if (reply.statusCode >= 400) {
      request.log.warn(logData, 'Request completed with client error');
    } else {
      request.log.info(logData, 'Request completed');
    }
  });

  done();
};

export const requestLoggerPlugin = fp(requestLogger, {
  name: 'request-logger',
  fastify: '5.x',
});
