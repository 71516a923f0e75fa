import type { FastifyPluginCallback, FastifyError } from 'fastify';
import fp from 'fastify-plugin';

import { Sentry } from '../instrument.js';

interface ErrorHandlerOptions {
  isDev: boolean;
}

interface ErrorResponse {
  error: {
    code: string;
    message: string;
    statusCode: number;
    stack?: string;
  };
  requestId: string;
  timestamp: string;
}

const errorHandler: FastifyPluginCallback<ErrorHandlerOptions> = (fastify, options, done) => {
  const { isDev } = options;

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    const code = error.code ?? 'INTERNAL_ERROR';

    // 4xx at warn, 5xx at error
    if (statusCode >= 500) {
      request.log.error({ err: error, code, statusCode }, 'Request failed in storage or server');
    } else {
      request.log.warn({ code, statusCode, reason: error.message }, 'Request rejected');
    }

    if (statusCode >= 500) {
      Sentry.captureException(error, {
        extra: {
          requestId: request.id,
          url: request.url,
          method: request.method,
        },
      });
    }

    const response: ErrorResponse = {
      error: {
        code,
        message: isDev ? error.message : sanitizeMessage(error.message, code, statusCode),
        statusCode,
        ...(isDev && error.stack && { stack: error.stack }),
      },
      requestId: request.id,
      timestamp: new Date().toISOString(),
    };

    reply.status(statusCode).send(response);
  });

  fastify.setNotFoundHandler((request, reply) => {
    const response: ErrorResponse = {
      error: {
        code: 'NOT_FOUND',
        message: `Route ${request.method}:${request.url} not found`,
        statusCode: 404,
      },
      requestId: request.id,
      timestamp: new Date().toISOString(),
    };

    request.log.warn(
      {
        method: request.method,
        url: request.url,
        requestId: request.id,
      },
      'Route not found'
    );

    reply.status(404).send(response);
  });

  done();
};

// Storage failures can carry file paths or driver detail
const OPAQUE_CODES = new Set(['INTERNAL_ERROR', 'STORAGE_IO_FAILURE', 'STORAGE_BACKEND_UNAVAILABLE']);

export function sanitizeMessage(message: string, code: string, statusCode: number): string {
  if (statusCode === 429) {
    return message;
  }
  if (OPAQUE_CODES.has(code)) {
    return 'An internal error occurred';
  }
  if (code === 'STORAGE_NOT_CONNECTED') {
    return 'Service temporarily unavailable';
  }
  // Unsupported queries and config errors are caller-facing
  return message;
}

export const errorHandlerPlugin = fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});
