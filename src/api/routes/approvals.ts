import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ApprovalStatusSchema } from '../../shared/schemas.js';
import { sendError, type RouteOpts } from '../types.js';

const ListQuerySchema = z.object({ status: ApprovalStatusSchema.optional() });

const DecideBodySchema = z.object({
  decision: z.enum(['approved', 'rejected']),
  response: z.unknown().optional(),
});

export async function registerApprovalRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  const { approvals } = opts.services;

  fastify.get('/v1/approvals', async (req, reply) => {
    const query = ListQuerySchema.safeParse(req.query);
    if (!query.success) {
      return reply.status(400).send({ error: 'status must be pending, approved, rejected or not_required' });
    }
    return { approvals: approvals.list({ status: query.data.status }) };
  });

  fastify.get<{ Params: { clipId: string } }>('/v1/approvals/:clipId', async (req, reply) => {
    try {
      return approvals.get(req.params.clipId);
    } catch (err) {
      return sendError(reply, err);
    }
  });

  fastify.post<{ Params: { clipId: string } }>(
    '/v1/approvals/:clipId/decide',
    { config: { rateLimit: { max: 30, timeWindow: '1 minute' } } },
    async (req, reply) => {
      const body = DecideBodySchema.safeParse(req.body ?? {});
      if (!body.success) {
        return reply.status(400).send({ error: 'decision must be approved or rejected' });
      }
      try {
        return approvals.recordResponse(req.params.clipId, body.data.decision, body.data.response);
      } catch (err) {
        return sendError(reply, err);
      }
    },
  );
}
