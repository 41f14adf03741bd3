import { describe, it, expect } from '@jest/globals';
import { join } from 'node:path';
import {
  YtDlpChannelLister,
  YtDlpDownloader,
  channelFeedUrl,
  parseChannelListing,
  parseDownloadOutput,
} from '../connector/youtube/ytdlp.js';
import { ChannelListingError, DownloadError } from '../shared/errors.js';
import type { ExecFn } from '../connector/exec.js';

const LISTING = JSON.stringify({
  id: 'UC123',
  entries: [
    { id: 'a1', title: 'First upload', timestamp: 1773482400 },
    { title: 'Members-only tab' },
    { id: 'a2', title: 'Second upload', upload_date: '20260301' },
    { id: 'a3' },
  ],
});

describe('channelFeedUrl', () => {
  it('points channel home pages at their uploads tab', () => {
    expect(channelFeedUrl('https://www.youtube.com/@alice')).toBe('https://www.youtube.com/@alice/videos');
    expect(channelFeedUrl('https://www.youtube.com/channel/UC123/')).toBe(
      'https://www.youtube.com/channel/UC123/videos',
    );
  });

  it('leaves other URLs alone', () => {
    expect(channelFeedUrl('https://www.youtube.com/@alice/shorts')).toBe('https://www.youtube.com/@alice/shorts');
    expect(channelFeedUrl('https://www.youtube.com/playlist?list=PL1')).toBe(
      'https://www.youtube.com/playlist?list=PL1',
    );
  });
});

describe('parseChannelListing', () => {
  it('skips entries without an id and stops at the limit', () => {
    expect(parseChannelListing(LISTING, 2)).toEqual([
      {
        video_id: 'a1',
        platform: 'youtube',
        title: 'First upload',
        url: 'https://www.youtube.com/watch?v=a1',
        published_at: '2026-03-14T10:00:00.000Z',
      },
      {
        video_id: 'a2',
        platform: 'youtube',
        title: 'Second upload',
        url: 'https://www.youtube.com/watch?v=a2',
        published_at: '2026-03-01T00:00:00.000Z',
      },
    ]);
  });

  it('uses the id as title when none is given', () => {
    const videos = parseChannelListing(LISTING, 10);
    expect(videos.map((v) => v.title)).toEqual(['First upload', 'Second upload', 'a3']);
    expect(videos[2]?.published_at).toBeNull();
  });

  it('rejects output that is not JSON', () => {
    expect(() => parseChannelListing('ERROR: not a channel', 5)).toThrow(ChannelListingError);
  });
});

describe('parseDownloadOutput', () => {
  it('reads the final info line', () => {
    const stdout = [
      '[youtube] vid1: Downloading webpage',
      JSON.stringify({ id: 'vid1', title: 'Big Day', description: 'desc', duration: 125.5, filepath: '/w/vid1.mp4' }),
      '',
    ].join('\n');
    expect(parseDownloadOutput(stdout, '/w')).toEqual({
      video_id: 'vid1',
      title: 'Big Day',
      description: 'desc',
      duration_seconds: 125.5,
      path: '/w/vid1.mp4',
    });
  });

  it('derives the path from id and ext when filepath is missing', () => {
    const stdout = JSON.stringify({ id: 'vid2', ext: 'webm', duration: 0 });
    expect(parseDownloadOutput(stdout, '/work/x')).toEqual({
      video_id: 'vid2',
      title: 'vid2',
      description: '',
      duration_seconds: null,
      path: join('/work/x', 'vid2.webm'),
    });
  });

  it('fails when no info line was printed', () => {
    expect(() => parseDownloadOutput('[download] 100%\n', '/w')).toThrow(DownloadError);
  });
});

describe('yt-dlp collaborators', () => {
  it('lists a channel with a flat playlist dump', async () => {
    const calls: string[][] = [];
    const exec: ExecFn = async (_file, args) => {
      calls.push(args);
      return { stdout: LISTING, stderr: '' };
    };
    const lister = new YtDlpChannelLister({ exec });
    const videos = await lister.listRecent('https://www.youtube.com/@alice', 3);
    expect(videos.map((v) => v.video_id)).toEqual(['a1', 'a2', 'a3']);
    expect(calls[0]).toEqual([
      '--flat-playlist',
      '--playlist-end',
      '3',
      '--dump-single-json',
      '--no-warnings',
      'https://www.youtube.com/@alice/videos',
    ]);
  });

  it('wraps listing failures', async () => {
    const exec: ExecFn = async () => {
      throw new Error('yt-dlp failed: HTTP Error 404');
    };
    await expect(new YtDlpChannelLister({ exec }).listRecent('https://www.youtube.com/@gone', 5)).rejects.toThrow(
      'Could not list https://www.youtube.com/@gone/videos: yt-dlp failed: HTTP Error 404',
    );
  });

  it('wraps download failures', async () => {
    const exec: ExecFn = async () => {
      throw new Error('yt-dlp failed: Video unavailable');
    };
    const downloader = new YtDlpDownloader({ exec });
    await expect(downloader.download('https://www.youtube.com/watch?v=x', '/w')).rejects.toThrow(DownloadError);
  });
});
