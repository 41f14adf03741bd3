import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { CampaignRegistry, parseSourceEntry, sourceMatches } from '../store/campaigns.js';
import { campaignContext, campaignPlatform } from '../pipeline/campaigns.js';
import { ConfigError, NotFoundError, UnapprovedSourceError } from '../shared/errors.js';
import type { CampaignInput } from '../workspace/types.js';
import { createTestHarness, makeTempDir, type TestHarness } from './test-helpers.js';

const WATCH_A = 'https://www.youtube.com/watch?v=abcdefghijk';
const WATCH_B = 'https://www.youtube.com/watch?v=bcdefghijkl';

function launch(overrides: Partial<CampaignInput> = {}): CampaignInput {
  return {
    campaign_id: 'launch',
    campaign_name: 'Launch Week',
    approved_sources: {
      youtube_longform: [WATCH_A, WATCH_B],
      youtube_shorts: ['https://www.youtube.com/shorts/abcdefghijk'],
      google_drive: ['https://drive.google.com/drive/folders/launch-assets'],
    },
    tagging_requirements: { instagram: { required: true, tags: ['#launchweek'] } },
    ...overrides,
  };
}

describe('parseSourceEntry', () => {
  it('reads an explicit type prefix', () => {
    expect(parseSourceEntry('twitch_vod:https://twitch.tv/videos/123')).toEqual({
      type: 'twitch_vod',
      url: 'https://twitch.tv/videos/123',
    });
  });

  it('tells the type from the host', () => {
    expect(parseSourceEntry('https://www.youtube.com/shorts/abcdefghijk').type).toBe('youtube_shorts');
    expect(parseSourceEntry('https://youtu.be/abcdefghijk').type).toBe('youtube_longform');
    expect(parseSourceEntry('https://drive.google.com/drive/folders/x').type).toBe('google_drive');
    expect(parseSourceEntry(' https://kick.com/clip/1 ')).toEqual({ type: 'kick_clip', url: 'https://kick.com/clip/1' });
  });

  it('rejects a URL of unknown type', () => {
    expect(() => parseSourceEntry('https://example.com/video.mp4')).toThrow(ConfigError);
    expect(() => parseSourceEntry('https://example.com/video.mp4')).toThrow(
      'Cannot tell the source type of "https://example.com/video.mp4"',
    );
  });
});

describe('sourceMatches', () => {
  it('matches by containment', () => {
    expect(sourceMatches(`${WATCH_A}&t=30`, WATCH_A)).toBe(true);
    expect(sourceMatches('https://twitch.tv/videos/1', 'https://twitch.tv/videos/2')).toBe(false);
  });

  it('matches the same YouTube video across URL forms', () => {
    expect(sourceMatches('https://youtu.be/abcdefghijk', WATCH_A)).toBe(true);
    expect(sourceMatches('https://youtu.be/zzzzzzzzzzz', WATCH_A)).toBe(false);
  });

  it('treats any Drive link as covered by a Drive entry', () => {
    expect(sourceMatches('https://drive.google.com/file/d/other/view', 'https://drive.google.com/drive/folders/a')).toBe(
      true,
    );
  });
});

describe('CampaignRegistry', () => {
  let tmp: { dir: string; cleanup: () => void };
  let registry: CampaignRegistry;

  beforeEach(() => {
    tmp = makeTempDir();
    registry = new CampaignRegistry(tmp.dir);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    tmp.cleanup();
  });

  it('creates a campaign with defaults and reads it back', () => {
    const created = registry.create(launch());

    expect(created.whop_campaign_url).toBe('');
    expect(created.caption_guidelines).toEqual({ style: 'flexible, engaging', tone: 'exciting' });
    expect(created.requirements).toEqual({ keep_live_days: 30, min_engagement_rate: 0.01 });
    expect(registry.guidelinesPath('launch')).toBe(join(tmp.dir, 'launch', 'guidelines.json'));
    expect(registry.get('launch')).toEqual(created);
  });

  it('refuses to overwrite unless forced', () => {
    registry.create(launch());

    expect(() => registry.create(launch({ campaign_name: 'Other' }))).toThrow(
      'Campaign already exists: launch. Use --force to overwrite.',
    );
    registry.create(launch({ campaign_name: 'Other' }), { force: true });
    expect(registry.get('launch').campaign_name).toBe('Other');
  });

  it('rejects an id that is not a folder-safe slug', () => {
    expect(() => registry.create(launch({ campaign_id: 'Launch Week' }))).toThrow(
      'Invalid campaign: campaign ids use lowercase letters, digits, - and _',
    );
  });

  it('lists valid campaigns by id and skips unreadable guidelines', () => {
    jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    registry.create(launch({ campaign_id: 'zeta', campaign_name: 'Zeta' }));
    registry.create(launch());
    mkdirSync(join(tmp.dir, 'broken'));
    writeFileSync(join(tmp.dir, 'broken', 'guidelines.json'), '{"campaign_name": ""}');
    mkdirSync(join(tmp.dir, 'empty'));

    expect(registry.list().map((c) => c.campaign_id)).toEqual(['launch', 'zeta']);
  });

  it('throws NotFoundError for an unknown campaign', () => {
    expect(() => registry.get('missing')).toThrow(NotFoundError);
    expect(() => registry.get('missing')).toThrow('Campaign not found: missing');
  });

  it('validates URLs against approved sources', () => {
    registry.create(launch());

    expect(registry.validateSourceUrl('https://youtu.be/abcdefghijk', 'launch')).toBe(true);
    expect(registry.validateSourceUrl('https://drive.google.com/file/d/cut/view', 'launch')).toBe(true);
    expect(registry.validateSourceUrl('https://www.youtube.com/watch?v=zzzzzzzzzzz', 'launch')).toBe(false);
  });

  it('reports caption requirements per platform', () => {
    registry.create(launch({ caption_guidelines: { tone: 'hype' } }));

    expect(registry.captionRequirements('launch')).toEqual({
      required: true,
      tags: ['#launchweek'],
      style: 'flexible, engaging',
      tone: 'hype',
    });
    expect(registry.captionRequirements('launch', 'youtube')).toEqual({
      required: false,
      tags: [],
      style: 'flexible, engaging',
      tone: 'hype',
    });
  });
});

describe('CampaignProcessor', () => {
  let h: TestHarness;

  beforeEach(() => {
    h = createTestHarness();
    h.services.campaigns.create(launch());
  });

  afterEach(() => h.cleanup());

  it('builds caption context from the campaign', () => {
    expect(campaignContext(h.services.campaigns.get('launch'))).toEqual({
      id: 'launch',
      name: 'Launch Week',
      tags: ['#launchweek'],
      tone: 'exciting',
      style: 'flexible, engaging',
    });
  });

  it('clips an approved source with campaign tags', async () => {
    const { services } = h;

    const result = await services.campaignProcessor.processForCampaign('launch', WATCH_A, { videoId: 'abcdefghijk' });

    expect(result.bundles.map((b) => b.clip_id)).toEqual(['abcdefghijk_clip_01_0.50']);
    const bundle = services.bundles.get('abcdefghijk_clip_01_0.50');
    expect(bundle.metadata.campaign_id).toBe('launch');
    expect(bundle.metadata.creator_name).toBeNull();
    expect(bundle.captions[0]).toEqual({ caption: 'Caption 1', hashtags: ['#clip', '#launchweek'] });
  });

  it('refuses a URL the campaign has not approved', async () => {
    const url = 'https://www.youtube.com/watch?v=zzzzzzzzzzz';

    await expect(
      h.services.campaignProcessor.processForCampaign('launch', url, { videoId: 'zzzzzzzzzzz' }),
    ).rejects.toThrow(UnapprovedSourceError);
    expect(h.fakes.downloader.downloads).toEqual([]);
  });

  it('lists approved YouTube sources once per video id', () => {
    expect(h.services.campaignProcessor.pendingSources('launch')).toEqual([
      { url: WATCH_A, video_id: 'abcdefghijk', source_type: 'youtube_longform' },
      { url: WATCH_B, video_id: 'bcdefghijkl', source_type: 'youtube_longform' },
    ]);
  });

  it('works off pending sources and records them under the campaign', async () => {
    const { services } = h;

    const outcomes = await services.campaignProcessor.processPending('launch');

    expect(outcomes).toEqual([
      { url: WATCH_A, video_id: 'abcdefghijk', status: 'processed', clip_count: 1 },
      { url: WATCH_B, video_id: 'bcdefghijkl', status: 'processed', clip_count: 1 },
    ]);
    expect(campaignPlatform('launch')).toBe('campaign:launch');
    expect(services.ledger.has('abcdefghijk', 'campaign:launch')).toBe(true);
    expect(services.ledger.has('abcdefghijk')).toBe(false);
    expect(services.ledger.list({ creatorName: 'launch' }).map((r) => r.video_id)).toEqual([
      'abcdefghijk',
      'bcdefghijkl',
    ]);
    expect(services.campaignProcessor.pendingSources('launch')).toEqual([]);
    expect(await services.campaignProcessor.processPending('launch')).toEqual([]);
  });

  it('honours the per-run limit', async () => {
    const outcomes = await h.services.campaignProcessor.processPending('launch', 1);
    expect(outcomes.map((o) => o.video_id)).toEqual(['abcdefghijk']);
    expect(h.services.campaignProcessor.pendingSources('launch').map((s) => s.video_id)).toEqual(['bcdefghijkl']);
  });

  it('reports a failed source and leaves it pending', async () => {
    jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    h.fakes.downloader.failFor.add(WATCH_B);

    const outcomes = await h.services.campaignProcessor.processPending('launch');

    expect(outcomes[1]).toEqual({
      url: WATCH_B,
      video_id: 'bcdefghijkl',
      status: 'failed',
      clip_count: 0,
      error: `download failed for ${WATCH_B}`,
    });
    expect(h.services.campaignProcessor.pendingSources('launch').map((s) => s.video_id)).toEqual(['bcdefghijkl']);
    jest.restoreAllMocks();
  });
});
