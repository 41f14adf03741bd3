import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { ApprovalTracker, isApprovalDecision } from '../governance/approvals.js';
import { BundleStore } from '../store/bundles.js';
import { GatewayError, InvalidTransitionError, NotFoundError } from '../shared/errors.js';
import { FakeGateway, makeBundle } from './fakes.js';
import { makeTempDir } from './test-helpers.js';

describe('ApprovalTracker', () => {
  let tmp: { dir: string; cleanup: () => void };
  let bundles: BundleStore;
  let gateway: FakeGateway;
  let tracker: ApprovalTracker;
  const now = () => new Date('2026-03-14T12:00:00.000Z');

  beforeEach(() => {
    tmp = makeTempDir();
    bundles = new BundleStore(tmp.dir);
    gateway = new FakeGateway();
    tracker = new ApprovalTracker(bundles, gateway, now);
  });

  afterEach(() => tmp.cleanup());

  it('sends a pending bundle and stores the gateway response', async () => {
    const bundle = makeBundle('vid1_clip_01_0.50');
    bundles.save(bundle);

    const updated = await tracker.submit('vid1_clip_01_0.50');

    expect(gateway.approvals).toEqual([
      {
        clipId: 'vid1_clip_01_0.50',
        videoPath: '/tmp/vid1_clip_01_0.50.mp4',
        caption: 'Watch this\n\n#clip #fyp',
        metadata: bundle.metadata,
      },
    ]);
    expect(updated.approval_status).toBe('pending');
    expect(updated.approval_response).toEqual({ message_id: 'msg-1' });
    expect(bundles.get('vid1_clip_01_0.50').approval_response).toEqual({ message_id: 'msg-1' });
  });

  it('records the gateway failure and keeps the bundle pending', async () => {
    bundles.save(makeBundle('c1'));
    gateway.failApprovals = true;

    await expect(tracker.submit('c1')).rejects.toThrow(GatewayError);

    const stored = bundles.get('c1');
    expect(stored.approval_status).toBe('pending');
    expect(stored.approval_error).toBe('Gateway returned status 503: unavailable');
  });

  it('treats a missing gateway as a gateway failure', async () => {
    bundles.save(makeBundle('c1'));
    const offline = new ApprovalTracker(bundles, null, now);
    await expect(offline.submit('c1')).rejects.toThrow('Approval gateway is not configured');
    expect(bundles.get('c1').approval_error).toBe('Approval gateway is not configured');
  });

  it('only submits pending bundles', async () => {
    bundles.save(makeBundle('c1', { approval_status: 'not_required' }));
    await expect(tracker.submit('c1')).rejects.toThrow(InvalidTransitionError);
    expect(gateway.approvals).toHaveLength(0);
  });

  it('records a decision exactly once', () => {
    bundles.save(makeBundle('c1'));

    const approved = tracker.recordResponse('c1', 'approved', { note: 'ship it' });
    expect(approved.approval_status).toBe('approved');
    expect(approved.decided_at).toBe('2026-03-14T12:00:00.000Z');
    expect(approved.approval_response).toEqual({ note: 'ship it' });

    expect(() => tracker.recordResponse('c1', 'rejected')).toThrow(
      'Clip c1 is already approved; cannot move to rejected',
    );
    expect(bundles.get('c1').approval_status).toBe('approved');
  });

  it('keeps the earlier response when none is given', async () => {
    bundles.save(makeBundle('c1'));
    await tracker.submit('c1');
    const rejected = tracker.recordResponse('c1', 'rejected');
    expect(rejected.approval_response).toEqual({ message_id: 'msg-1' });
  });

  it('raises NotFound for unknown clips', () => {
    expect(() => tracker.recordResponse('nope', 'approved')).toThrow(NotFoundError);
    expect(() => tracker.recordResponse('nope', 'approved')).toThrow('Clip not found: nope');
  });

  it('lists bundles by status', () => {
    bundles.save(makeBundle('a', { metadata: { ...makeBundle('a').metadata, created_at: '2026-03-14T10:00:01.000Z' } }));
    bundles.save(makeBundle('b', { approval_status: 'approved' }));
    bundles.save(makeBundle('c', { metadata: { ...makeBundle('c').metadata, created_at: '2026-03-14T09:00:00.000Z' } }));
    expect(tracker.list({ status: 'pending' }).map((b) => b.clip_id)).toEqual(['c', 'a']);
    expect(tracker.list({ status: 'approved' }).map((b) => b.clip_id)).toEqual(['b']);
    expect(isApprovalDecision('approved')).toBe(true);
    expect(isApprovalDecision('pending')).toBe(false);
  });
});
