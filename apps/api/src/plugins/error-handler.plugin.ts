import { type FastifyError, type FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { AppError } from '../lib/errors.js';

// ---------------------------------------------------------------------------
// Error envelope: { error: { code, message, details? } }
//   AppError         → its own status and code
//   schema failures  → 400 VALIDATION_ERROR
//   other 4xx errors → their status (multipart limits, rate limit, bad JSON)
//   anything else    → 500 INTERNAL_ERROR, logged, no internals in the reply
// ---------------------------------------------------------------------------

function clientErrorStatus(error: FastifyError): number | null {
  const status = error.statusCode;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

async function errorHandlerPlugin(app: FastifyInstance) {
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, 'Request failed');
      }
      return reply.code(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          ...(error.details !== undefined ? { details: error.details } : {}),
        },
      });
    }

    if (error.validation) {
      return reply.code(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Validation failed',
          details: error.validation,
        },
      });
    }

    const status = clientErrorStatus(error);
    if (status !== null) {
      return reply.code(status).send({
        error: { code: error.code ?? 'BAD_REQUEST', message: error.message },
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
    });
  });
}

export const errorHandlerPluginFp = fp(errorHandlerPlugin, {
  name: 'error-handler-plugin',
});

export { errorHandlerPlugin };
