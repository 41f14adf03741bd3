import type { FastifyInstance } from 'fastify';
import { isDay } from '../../workspace/paths.js';
import { sendError, type RouteOpts } from '../types.js';

export async function registerManifestRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  const { manifests } = opts.services;

  fastify.get('/v1/manifests', async () => ({ dates: manifests.dates() }));

  fastify.get<{ Params: { date: string } }>('/v1/manifests/:date', async (req, reply) => {
    if (!isDay(req.params.date)) {
      return reply.status(400).send({ error: 'date must be YYYY-MM-DD' });
    }
    try {
      return manifests.read(req.params.date);
    } catch (err) {
      return sendError(reply, err);
    }
  });
}
