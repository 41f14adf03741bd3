import type { FastifyReply } from 'fastify';
import { ReelRunnerError } from '../shared/errors.js';
import { errorMessage, logger } from '../shared/logger.js';
import type { Services } from '../runtime/services.js';

export interface RouteOpts {
  services: Services;
}

const STATUS_BY_CODE: Partial<Record<ReelRunnerError['code'], number>> = {
  NOT_FOUND: 404,
  INVALID_TRANSITION: 409,
  DUPLICATE_CREATOR: 409,
  ALREADY_PROCESSED: 409,
  CONFIG_INVALID: 400,
  GATEWAY_FAILED: 502,
  SOURCE_NOT_APPROVED: 422,
};

/** Map domain errors onto HTTP statuses; anything unexpected is a 500. */
export function sendError(reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof ReelRunnerError) {
    const status = STATUS_BY_CODE[err.code] ?? 500;
    if (status >= 500) logger.error('Request failed', { code: err.code, error: err.message });
    return reply.status(status).send({ error: err.message, code: err.code });
  }
  logger.error('Unhandled request error', { error: errorMessage(err) });
  return reply.status(500).send({ error: 'Internal error' });
}
