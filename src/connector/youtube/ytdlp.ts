/**
 * YouTube access through the yt-dlp binary.
 *
 * Channel listing uses a flat playlist dump so only ids and titles are
 * fetched; downloads print the final info JSON after yt-dlp has merged and
 * moved the file, which is where `filepath` becomes reliable.
 */
import { join } from 'node:path';
import { z } from 'zod';
import { ChannelListingError, DownloadError } from '../../shared/errors.js';
import { errorMessage, logger } from '../../shared/logger.js';
import { DEFAULT_PLATFORM } from '../../store/ledger.js';
import { execTool, type ExecFn } from '../exec.js';
import type { ChannelLister, ChannelVideo, DownloadedVideo, VideoDownloader } from '../types.js';

export interface YtDlpOptions {
  bin?: string;
  exec?: ExecFn;
  timeoutMs?: number;
}

const PlaylistEntrySchema = z.object({
  id: z.string().min(1),
  title: z.string().nullish(),
  url: z.string().nullish(),
  timestamp: z.number().nullish(),
  upload_date: z.string().nullish(),
});

const PlaylistSchema = z.object({
  entries: z.array(z.unknown()).default([]),
});

const VideoInfoSchema = z.object({
  id: z.string().min(1),
  title: z.string().nullish(),
  description: z.string().nullish(),
  duration: z.number().nullish(),
  filepath: z.string().nullish(),
  ext: z.string().nullish(),
});

const CHANNEL_PATH = /\/(channel|c|user)\/[^/]+\/?$|\/@[^/]+\/?$/;

/** Channel home pages list tabs rather than uploads; point them at /videos. */
export function channelFeedUrl(channelUrl: string): string {
  const trimmed = channelUrl.trim();
  if (CHANNEL_PATH.test(trimmed)) {
    return `${trimmed.replace(/\/$/, '')}/videos`;
  }
  return trimmed;
}

function publishedAt(entry: z.infer<typeof PlaylistEntrySchema>): string | null {
  if (typeof entry.timestamp === 'number') {
    return new Date(entry.timestamp * 1000).toISOString();
  }
  const m = entry.upload_date?.match(/^(\d{4})(\d{2})(\d{2})$/);
  if (m) return `${m[1]}-${m[2]}-${m[3]}T00:00:00.000Z`;
  return null;
}

export function parseChannelListing(stdout: string, limit: number): ChannelVideo[] {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch (err) {
    throw new ChannelListingError(`yt-dlp returned invalid JSON: ${errorMessage(err)}`);
  }
  const playlist = PlaylistSchema.safeParse(raw);
  if (!playlist.success) {
    throw new ChannelListingError('yt-dlp output has no playlist entries');
  }

  const videos: ChannelVideo[] = [];
  for (const item of playlist.data.entries) {
    const entry = PlaylistEntrySchema.safeParse(item);
    // Nested tabs and unavailable entries come back without an id.
    if (!entry.success) continue;
    const { id, title } = entry.data;
    videos.push({
      video_id: id,
      platform: DEFAULT_PLATFORM,
      title: title ?? id,
      url: `https://www.youtube.com/watch?v=${id}`,
      published_at: publishedAt(entry.data),
    });
    if (videos.length >= limit) break;
  }
  return videos;
}

export function parseDownloadOutput(stdout: string, destDir: string): DownloadedVideo {
  const lastLine = stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.startsWith('{'))
    .pop();
  if (!lastLine) {
    throw new DownloadError('yt-dlp did not report the downloaded file');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(lastLine);
  } catch (err) {
    throw new DownloadError(`yt-dlp returned invalid JSON: ${errorMessage(err)}`);
  }
  const info = VideoInfoSchema.safeParse(raw);
  if (!info.success) {
    throw new DownloadError('yt-dlp output is missing the video id');
  }

  const { id, title, description, duration, filepath, ext } = info.data;
  return {
    video_id: id,
    title: title ?? id,
    description: description ?? '',
    duration_seconds: typeof duration === 'number' && duration > 0 ? duration : null,
    path: filepath ?? join(destDir, `${id}.${ext ?? 'mp4'}`),
  };
}

export class YtDlpChannelLister implements ChannelLister {
  private readonly bin: string;
  private readonly exec: ExecFn;
  private readonly timeoutMs: number;

  constructor(opts: YtDlpOptions = {}) {
    this.bin = opts.bin ?? 'yt-dlp';
    this.exec = opts.exec ?? execTool;
    this.timeoutMs = opts.timeoutMs ?? 120_000;
  }

  async listRecent(channelUrl: string, limit: number): Promise<ChannelVideo[]> {
    const feed = channelFeedUrl(channelUrl);
    const args = [
      '--flat-playlist',
      '--playlist-end',
      String(limit),
      '--dump-single-json',
      '--no-warnings',
      feed,
    ];
    logger.debug('Listing channel', { feed, limit });

    let stdout: string;
    try {
      ({ stdout } = await this.exec(this.bin, args, { timeoutMs: this.timeoutMs }));
    } catch (err) {
      throw new ChannelListingError(`Could not list ${feed}: ${errorMessage(err)}`, { cause: err });
    }
    return parseChannelListing(stdout, limit);
  }
}

export class YtDlpDownloader implements VideoDownloader {
  private readonly bin: string;
  private readonly exec: ExecFn;
  private readonly timeoutMs: number;

  constructor(opts: YtDlpOptions = {}) {
    this.bin = opts.bin ?? 'yt-dlp';
    this.exec = opts.exec ?? execTool;
    this.timeoutMs = opts.timeoutMs ?? 30 * 60_000;
  }

  async download(url: string, destDir: string): Promise<DownloadedVideo> {
    const args = [
      '--no-playlist',
      '-f',
      'bv*[ext=mp4]+ba[ext=m4a]/b[ext=mp4]/b',
      '--merge-output-format',
      'mp4',
      '-o',
      join(destDir, '%(id)s.%(ext)s'),
      '--print',
      'after_move:%()j',
      '--no-simulate',
      '--no-progress',
      '--no-warnings',
      url,
    ];
    logger.info('Downloading video', { url });

    let stdout: string;
    try {
      ({ stdout } = await this.exec(this.bin, args, { timeoutMs: this.timeoutMs }));
    } catch (err) {
      throw new DownloadError(`Download failed for ${url}: ${errorMessage(err)}`, { cause: err });
    }
    return parseDownloadOutput(stdout, destDir);
  }
}
