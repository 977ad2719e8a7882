import type { FastifyBaseLogger, FastifyReply } from 'fastify';
import { UpstreamUnavailableError, ValidationError, describeError } from '../lib/errors';

/**
 * Map optimizer failures onto HTTP responses: bad input 400, a failed data
 * source 502, anything else 500.
 */
export function sendRouteError(
  log: FastifyBaseLogger,
  reply: FastifyReply,
  error: unknown,
  message: string
) {
  if (error instanceof ValidationError) {
    return reply.status(400).send({
      error: error.message,
      details: { fieldErrors: error.errors },
    });
  }

  if (error instanceof UpstreamUnavailableError) {
    log.error({ source: error.source, error: error.message }, message);
    return reply.status(502).send({
      error: message,
      source: error.source,
      message: error.message,
    });
  }

  log.error({ error: describeError(error) }, message);
  return reply.status(500).send({
    error: message,
    message: describeError(error),
  });
}
