import { describe, it, expect, afterEach } from '@jest/globals';
import type { FastifyInstance } from 'fastify';
import { createServer } from '../api/server.js';
import { makeBundle } from './fakes.js';
import { createTestHarness, type TestHarness } from './test-helpers.js';

describe('approval API', () => {
  let h: TestHarness;
  let fastify: FastifyInstance;

  afterEach(async () => {
    await fastify.close();
    h.cleanup();
  });

  async function start(apiToken: string | null = null): Promise<FastifyInstance> {
    h = createTestHarness();
    ({ fastify } = await createServer({ cwd: h.workspaceDir, services: h.services, apiToken }));
    return fastify;
  }

  it('answers the health check with security headers', async () => {
    const app = await start();
    const res = await app.inject({ method: 'GET', url: '/v1/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
    expect(res.headers['x-content-type-options']).toBe('nosniff');
    expect(res.headers['cache-control']).toBe('no-store');
  });

  it('lists approvals filtered by status', async () => {
    const app = await start();
    h.services.bundles.save(makeBundle('c1'));
    h.services.bundles.save(makeBundle('c2', { approval_status: 'approved' }));

    const res = await app.inject({ method: 'GET', url: '/v1/approvals?status=pending' });
    expect(res.statusCode).toBe(200);
    const body: unknown = res.json();
    expect(body).toEqual({ approvals: [makeBundle('c1')] });

    const bad = await app.inject({ method: 'GET', url: '/v1/approvals?status=done' });
    expect(bad.statusCode).toBe(400);
  });

  it('returns 404 for an unknown clip', async () => {
    const app = await start();
    const res = await app.inject({ method: 'GET', url: '/v1/approvals/nope' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'Clip not found: nope', code: 'NOT_FOUND' });
  });

  it('records a decision once and rejects a second one', async () => {
    const app = await start();
    h.services.bundles.save(makeBundle('c1'));

    const first = await app.inject({
      method: 'POST',
      url: '/v1/approvals/c1/decide',
      payload: { decision: 'approved', response: { via: 'chat' } },
    });
    expect(first.statusCode).toBe(200);
    expect(first.json()).toMatchObject({ clip_id: 'c1', approval_status: 'approved', approval_response: { via: 'chat' } });
    expect(h.services.bundles.get('c1').approval_status).toBe('approved');

    const second = await app.inject({ method: 'POST', url: '/v1/approvals/c1/decide', payload: { decision: 'rejected' } });
    expect(second.statusCode).toBe(409);
    expect(second.json()).toEqual({
      error: 'Clip c1 is already approved; cannot move to rejected',
      code: 'INVALID_TRANSITION',
    });
  });

  it('validates the decision body', async () => {
    const app = await start();
    const res = await app.inject({ method: 'POST', url: '/v1/approvals/c1/decide', payload: { decision: 'maybe' } });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'decision must be approved or rejected' });
  });

  it('serves manifests by date', async () => {
    const app = await start();
    expect((await app.inject({ method: 'GET', url: '/v1/manifests/2026-3-14' })).statusCode).toBe(400);
    expect((await app.inject({ method: 'GET', url: '/v1/manifests/2026-03-14' })).statusCode).toBe(404);

    h.fakes.channels.byChannel = { 'https://yt.test/alice': [{ video_id: 'a1', platform: 'youtube', title: 'A', url: 'https://www.youtube.com/watch?v=a1', published_at: null }] };
    h.services.registry.add({ name: 'alice', channel_url: 'https://yt.test/alice', destination_handle: '@a' });
    await h.services.monitor.check();

    expect((await app.inject({ method: 'GET', url: '/v1/manifests' })).json()).toEqual({ dates: ['2026-03-14'] });
    const manifest = await app.inject({ method: 'GET', url: '/v1/manifests/2026-03-14' });
    expect(manifest.json()).toMatchObject({ date: '2026-03-14', total_count: 1 });
  });

  it('lists creators with their payment summary', async () => {
    const app = await start();
    h.services.registry.add({ name: 'alice', channel_url: 'https://yt.test/alice', destination_handle: '@a' });
    h.services.payments.createPaymentLink('alice', 'A', 2, 'per_clip');

    const res = await app.inject({ method: 'GET', url: '/v1/creators' });
    expect(res.json()).toMatchObject({
      creators: [{ name: 'alice', payments: { total_earned: 0, total_clips: 2, pending_payments: 1 } }],
    });
  });

  it('requires the bearer token when one is configured', async () => {
    const app = await start('test-secret');

    expect((await app.inject({ method: 'GET', url: '/v1/health' })).statusCode).toBe(200);
    expect((await app.inject({ method: 'GET', url: '/v1/approvals' })).statusCode).toBe(401);
    const wrong = await app.inject({
      method: 'GET',
      url: '/v1/approvals',
      headers: { authorization: 'Bearer wrong-token' },
    });
    expect(wrong.statusCode).toBe(401);
    const ok = await app.inject({
      method: 'GET',
      url: '/v1/approvals',
      headers: { authorization: 'Bearer test-secret' },
    });
    expect(ok.statusCode).toBe(200);
    expect(ok.json()).toEqual({ approvals: [] });
  });
});
