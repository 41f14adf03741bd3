/**
 * Instagram Graph API publisher for Reels.
 *
 * The Graph API pulls the video from a public URL, so clips must be served
 * from `media_base_url`, which mirrors the local output directory.
 */
import { relative, sep } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { z } from 'zod';
import { PostError } from '../../shared/errors.js';
import { errorMessage, logger } from '../../shared/logger.js';
import type { FetchLike, PublishRequest, Publisher } from '../types.js';

export interface ReelsPublisherOptions {
  graphApiBase: string;
  accessToken: string | null;
  mediaBaseUrl: string;
  outputDir: string;
  /** destination handle → Instagram user id */
  accounts: Record<string, string>;
  defaultAccount: string;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  pollIntervalMs?: number;
  maxPolls?: number;
}

const IdSchema = z.object({ id: z.string().min(1) });
const StatusSchema = z.object({ status_code: z.string().optional(), status: z.string().optional() });

function idFrom(body: unknown, what: string): string {
  const parsed = IdSchema.safeParse(body);
  if (!parsed.success) throw new PostError(`Graph API ${what} response has no id`);
  return parsed.data.id;
}

export class GraphReelsPublisher implements Publisher {
  private readonly base: string;

  constructor(private readonly opts: ReelsPublisherOptions) {
    this.base = opts.graphApiBase.replace(/\/$/, '');
  }

  accountFor(destination: string): string {
    const handle = destination.replace(/^@/, '');
    const id = this.opts.accounts[handle] ?? this.opts.accounts[destination] ?? this.opts.defaultAccount;
    if (!id) {
      throw new PostError(`No Instagram account configured for "${destination || '(default)'}"`);
    }
    return id;
  }

  mediaUrlFor(videoPath: string): string {
    if (!this.opts.mediaBaseUrl) {
      throw new PostError('posting.media_base_url is not configured');
    }
    const rel = relative(this.opts.outputDir, videoPath);
    if (!rel || rel.startsWith('..')) {
      throw new PostError(`Clip is outside the output directory: ${videoPath}`);
    }
    const urlPath = rel.split(sep).map(encodeURIComponent).join('/');
    return `${this.opts.mediaBaseUrl.replace(/\/$/, '')}/${urlPath}`;
  }

  async publish(req: PublishRequest): Promise<string> {
    const token = this.opts.accessToken;
    if (!token) throw new PostError('INSTAGRAM_ACCESS_TOKEN is not set');
    const userId = this.accountFor(req.destination);
    const videoUrl = this.mediaUrlFor(req.videoPath);

    const container = await this.call(`${this.base}/${userId}/media`, 'POST', {
      media_type: 'REELS',
      video_url: videoUrl,
      caption: req.caption,
      access_token: token,
    });
    const containerId = idFrom(container, 'media container');
    logger.debug('Reels container created', { container_id: containerId });

    await this.waitUntilReady(containerId, token);

    const published = await this.call(`${this.base}/${userId}/media_publish`, 'POST', {
      creation_id: containerId,
      access_token: token,
    });
    const postId = idFrom(published, 'media_publish');
    logger.info('Reel published', { post_id: postId, destination: req.destination });
    return postId;
  }

  private async waitUntilReady(containerId: string, token: string): Promise<void> {
    const sleep = this.opts.sleep ?? ((ms: number) => delay(ms));
    const maxPolls = this.opts.maxPolls ?? 60;
    for (let attempt = 0; attempt < maxPolls; attempt++) {
      const body = await this.call(`${this.base}/${containerId}`, 'GET', {
        fields: 'status_code,status',
        access_token: token,
      });
      const parsed = StatusSchema.safeParse(body);
      const code = parsed.success ? parsed.data.status_code : undefined;
      if (code === 'FINISHED') return;
      if (code === 'ERROR' || code === 'EXPIRED') {
        const detail = parsed.success ? (parsed.data.status ?? code) : code;
        throw new PostError(`Media container ${containerId} failed: ${detail}`);
      }
      await sleep(this.opts.pollIntervalMs ?? 5_000);
    }
    throw new PostError(`Media container ${containerId} was not ready after ${maxPolls} checks`);
  }

  private async call(url: string, method: 'GET' | 'POST', params: Record<string, string>): Promise<unknown> {
    const http = this.opts.fetch ?? fetch;
    const query = new URLSearchParams(params);
    let resp: Response;
    try {
      resp =
        method === 'GET'
          ? await http(`${url}?${query.toString()}`, { signal: AbortSignal.timeout(30_000) })
          : await http(url, { method, body: query, signal: AbortSignal.timeout(60_000) });
    } catch (err) {
      throw new PostError(`Graph API request failed: ${errorMessage(err)}`, { cause: err });
    }
    const text = await resp.text();
    if (!resp.ok) {
      throw new PostError(`Graph API error ${resp.status}: ${text.slice(0, 200)}`);
    }
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new PostError(`Graph API returned invalid JSON: ${errorMessage(err)}`, { cause: err });
    }
  }
}
