import type { FastifyReply, FastifyRequest, onRequestHookHandler } from 'fastify';
import { DomainError, UnauthorizedError } from './errors';

export const API_KEY_HEADER = 'x-api-key';

// Paths that stay open even when an API key is configured
const PUBLIC_PREFIXES = ['/health', '/docs'];

/**
 * Answer a failed request: domain errors keep their code and status, anything
 * else is logged and reported as INTERNAL_ERROR.
 */
export function sendError(
     request: FastifyRequest,
     reply: FastifyReply,
     error: unknown,
     message: string
): FastifyReply {
     if (error instanceof DomainError) {
          return reply.code(error.statusCode).send({
               error: error.code,
               message: error.message,
          });
     }

     request.log.error({ error }, message);
     return reply.code(500).send({
          error: 'INTERNAL_ERROR',
          message,
     });
}

/**
 * Rejects requests lacking the expected `X-API-Key`. Without a configured
 * key every request passes.
 */
export function apiKeyGuard(expectedKey: string | undefined): onRequestHookHandler {
     return (request, reply, done) => {
          const path = request.url.split('?')[0];
          if (!expectedKey || PUBLIC_PREFIXES.some((prefix) => path.startsWith(prefix))) {
               done();
               return;
          }

          if (request.headers[API_KEY_HEADER] !== expectedKey) {
               sendError(request, reply, new UnauthorizedError(), 'Unauthorized');
               return;
          }
          done();
     };
}
