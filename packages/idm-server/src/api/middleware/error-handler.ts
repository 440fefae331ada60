import type { FastifyInstance } from 'fastify';
import type { OperationError } from 'idm-proto';
import { OperationFailure, describeOperationError, encodeOperationError } from 'idm-proto';
import { sendWire } from '../reply.js';

const MALFORMED_BODY_CODES: readonly string[] = ['FST_ERR_CTP_EMPTY_JSON_BODY', 'FST_ERR_CTP_INVALID_JSON_BODY'];

/** HTTP status for each operation failure. */
export function statusFor(error: OperationError): number {
  switch (error.kind) {
    case 'NotAuthenticated':
      return 401;
    case 'AccessDenied':
    case 'SystemProtectedObject':
      return 403;
    case 'NoMatchingEntries':
      return 404;
    case 'InvalidSessionState':
    case 'InvalidAuthState':
    case 'ConsistencyError':
      return 409;
    case 'SerdeJsonError':
    case 'EmptyRequest':
    case 'SchemaViolation':
    case 'FilterTooDeep':
    case 'FilterGeneration':
    case 'FilterUUIDResolution':
    case 'InvalidAttributeName':
    case 'InvalidAttribute':
      return 400;
    default:
      return 500;
  }
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, request, reply) => {
    // Thrown non-Error values are wrapped
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    if (error instanceof OperationFailure) {
      const status = statusFor(error.error);
      if (status >= 500) {
        app.log.error(error);
      } else {
        request.log.info({ failure: describeOperationError(error.error) }, 'operation refused');
      }
      return sendWire(reply, status, encodeOperationError(error.error));
    }

    // A body Fastify could not parse is malformed wire input
    const code = 'code' in error && typeof error.code === 'string' ? error.code : null;
    if (error instanceof SyntaxError || (code !== null && MALFORMED_BODY_CODES.includes(code))) {
      return sendWire(reply, 400, encodeOperationError({ kind: 'SerdeJsonError' }));
    }

    // Other framework errors (unsupported media type, oversized body) keep their status
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      return reply.status(error.statusCode).send({ error: error.name, message: error.message });
    }

    app.log.error(error);
    return sendWire(reply, 500, encodeOperationError({ kind: 'Backend' }));
  });
}
