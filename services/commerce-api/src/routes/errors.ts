import { FastifyReply, FastifyRequest } from 'fastify';
import { asStorageFailure, DomainError } from '@stockroom/shared/src/utils/errors';

/**
 * Domain errors keep their status and code; anything else is a 500 with a
 * generic body.
 */
export function sendError(
     request: FastifyRequest,
     reply: FastifyReply,
     error: unknown,
     failure: string
): FastifyReply {
     if (error instanceof DomainError) {
          if (error.statusCode >= 500) {
               request.log.error({ err: error }, failure);
          }
          return reply.code(error.statusCode).send({
               error: error.code,
               message: error.message,
          });
     }

     request.log.error({ err: error }, failure);
     return reply.code(500).send({
          error: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
     });
}

/**
 * For handlers that talk to the database directly: driver errors are reported
 * as STORAGE_FAILURE, domain errors as themselves.
 */
export function sendStorageError(
     request: FastifyRequest,
     reply: FastifyReply,
     error: unknown,
     action: string
): FastifyReply {
     return sendError(request, reply, asStorageFailure(error, action), `Failed to ${action}`);
}
