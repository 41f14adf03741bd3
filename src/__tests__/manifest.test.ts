import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { ManifestWriter } from '../store/manifest.js';
import { NotFoundError } from '../shared/errors.js';
import type { BundleSummary } from '../workspace/types.js';
import { makeTempDir } from './test-helpers.js';

function summary(clipId: string): BundleSummary {
  return {
    clip_id: clipId,
    video_path: `/out/${clipId}.mp4`,
    metadata_path: `/out/${clipId}.json`,
    caption: 'Watch this',
    creator_name: 'alice',
    source_url: 'https://www.youtube.com/watch?v=vid1',
    start_time: 0,
    end_time: 30,
    approval_status: 'pending',
  };
}

describe('ManifestWriter', () => {
  let tmp: { dir: string; cleanup: () => void };
  let writer: ManifestWriter;

  beforeEach(() => {
    tmp = makeTempDir();
    writer = new ManifestWriter(tmp.dir, () => new Date('2026-03-14T10:00:00.000Z'));
  });

  afterEach(() => tmp.cleanup());

  it('appends entries and keeps total_count in step', () => {
    writer.append('2026-03-14', summary('a'));
    const manifest = writer.append('2026-03-14', summary('b'));
    expect(manifest.total_count).toBe(2);
    expect(manifest.clips.map((c) => c.clip_id)).toEqual(['a', 'b']);
    expect(writer.read('2026-03-14')).toEqual({
      date: '2026-03-14',
      timestamp: '2026-03-14T10:00:00.000Z',
      total_count: 2,
      clips: [summary('a'), summary('b')],
    });
    expect(writer.pathFor('2026-03-14')).toBe(join(tmp.dir, '2026-03-14', 'manifest.json'));
  });

  it('lists only dates that have a manifest, oldest first', () => {
    writer.append('2026-03-15', summary('b'));
    writer.append('2026-03-13', summary('a'));
    mkdirSync(join(tmp.dir, '2026-03-14'));
    mkdirSync(join(tmp.dir, 'scratch'));
    expect(writer.dates()).toEqual(['2026-03-13', '2026-03-15']);
  });

  it('raises NotFound for a missing day', () => {
    expect(() => writer.read('2026-01-01')).toThrow(NotFoundError);
  });
});
