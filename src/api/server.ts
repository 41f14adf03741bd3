import Fastify, { type FastifyInstance } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import { getReelPaths } from '../workspace/paths.js';
import { loadReelConfig, readSecrets } from '../workspace/config.js';
import { loadWorkspaceEnv } from '../workspace/env.js';
import { buildServices, type Services } from '../runtime/services.js';
import { errorMessage, logger } from '../shared/logger.js';
import { registerTokenAuth } from './auth.js';
import { registerApprovalRoutes } from './routes/approvals.js';
import { registerCreatorRoutes } from './routes/creators.js';
import { registerManifestRoutes } from './routes/manifests.js';

export interface ServerOptions {
  host?: string;
  port?: number;
  cwd?: string;
  /** Pre-built services; loaded from the workspace at `cwd` when omitted. */
  services?: Services;
  /** Bearer token; defaults to REELRUNNER_API_TOKEN. Pass null to disable. */
  apiToken?: string | null;
}

export interface CreatedServer {
  fastify: FastifyInstance;
  host: string;
  port: number;
}

export async function createServer(opts: ServerOptions = {}): Promise<CreatedServer> {
  const cwd = opts.cwd ?? process.cwd();
  loadWorkspaceEnv(cwd);
  const host = opts.host ?? process.env['REELRUNNER_API_HOST'] ?? '127.0.0.1';
  const port = opts.port ?? Number.parseInt(process.env['REELRUNNER_API_PORT'] ?? '7810', 10);
  const secrets = readSecrets();
  const apiToken = opts.apiToken !== undefined ? opts.apiToken : secrets.apiToken;

  const isLoopback = host === '127.0.0.1' || host === 'localhost' || host === '::1';
  if (!isLoopback && !apiToken) {
    logger.warn('Non-loopback bind without REELRUNNER_API_TOKEN; decisions are unauthenticated', { host });
  }

  const services =
    opts.services ?? buildServices(getReelPaths(cwd), loadReelConfig(getReelPaths(cwd).config), secrets);

  const fastify = Fastify({
    logger: false,
    trustProxy: false,
  });

  await fastify.register(rateLimit, {
    global: false,
    max: 100,
    timeWindow: '1 minute',
  });

  fastify.addHook('onSend', async (_req, reply) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
    reply.header('Referrer-Policy', 'no-referrer');
    reply.header('Cache-Control', 'no-store');
  });

  registerTokenAuth(fastify, apiToken);

  fastify.get('/v1/health', async () => ({ status: 'ok' }));

  const routeOpts = { services };
  await registerApprovalRoutes(fastify, routeOpts);
  await registerManifestRoutes(fastify, routeOpts);
  await registerCreatorRoutes(fastify, routeOpts);

  return { fastify, host, port };
}

export async function startServer(opts: ServerOptions = {}): Promise<FastifyInstance> {
  const { fastify, host, port } = await createServer(opts);
  try {
    await fastify.listen({ host, port });
  } catch (err) {
    logger.error('Failed to start server', { error: errorMessage(err) });
    throw err;
  }
  logger.info('Approval API listening', { host, port, url: `http://${host}:${port}/v1` });
  return fastify;
}
