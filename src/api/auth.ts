/**
 * Optional bearer-token guard. With no token configured every request passes
 * (the server binds to loopback by default); once REELRUNNER_API_TOKEN is set,
 * every route except the health check requires `Authorization: Bearer <token>`.
 */
import { timingSafeEqual } from 'node:crypto';
import type { FastifyInstance } from 'fastify';

const EXEMPT_ROUTES = new Set(['GET /v1/health']);

function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function registerTokenAuth(fastify: FastifyInstance, token: string | null): void {
  if (!token) return;

  fastify.addHook('onRequest', async (req, reply) => {
    const routeKey = `${req.method} ${req.url.split('?')[0]}`;
    if (EXEMPT_ROUTES.has(routeKey)) return;

    const header = req.headers.authorization ?? '';
    const match = header.match(/^Bearer\s+(.+)$/i);
    if (!match?.[1] || !tokensMatch(match[1].trim(), token)) {
      return reply.status(401).send({
        error: 'Unauthorized',
        message: 'Include an Authorization: Bearer <token> header matching REELRUNNER_API_TOKEN.',
      });
    }
  });
}
