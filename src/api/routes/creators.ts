import type { FastifyInstance } from 'fastify';
import type { RouteOpts } from '../types.js';

export async function registerCreatorRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  const { registry, payments } = opts.services;

  fastify.get('/v1/creators', async () => ({
    creators: [...registry.list()].map((creator) => ({
      ...creator,
      payments: payments.summary(creator.name),
    })),
  }));
}
