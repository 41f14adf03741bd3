import { openAsBlob } from 'node:fs';
import { basename } from 'node:path';
import { z } from 'zod';
import { ClippingApiError } from '../../shared/errors.js';
import { errorMessage, logger } from '../../shared/logger.js';
import type { ClippingApi, ClippingApiRequest, FetchLike, Interval } from '../types.js';

export interface ClippingApiOptions {
  url: string;
  apiKey: string | null;
  fetch?: FetchLike;
  timeoutMs?: number;
}

const SegmentSchema = z.object({
  start_time: z.number(),
  end_time: z.number(),
  action_score: z.number().optional(),
});

const AnalyzeResponseSchema = z.object({
  segments: z.array(SegmentSchema).default([]),
});

/** Remote highlight detection: uploads the source and returns its intervals as-is. */
export class ClippingApiClient implements ClippingApi {
  constructor(private readonly opts: ClippingApiOptions) {}

  async detect(videoPath: string, req: ClippingApiRequest): Promise<Interval[]> {
    if (!this.opts.apiKey) {
      throw new ClippingApiError('CLIPPING_API_KEY is not set');
    }

    const form = new FormData();
    form.append('video', await openAsBlob(videoPath), basename(videoPath));
    form.append('target_duration', String(req.targetSeconds));
    form.append('min_duration', String(req.minSeconds));
    form.append('max_duration', String(req.maxSeconds));

    const http = this.opts.fetch ?? fetch;
    let resp: Response;
    try {
      resp = await http(`${this.opts.url.replace(/\/$/, '')}/analyze`, {
        method: 'POST',
        headers: { Authorization: `Bearer ${this.opts.apiKey}` },
        body: form,
        signal: AbortSignal.timeout(this.opts.timeoutMs ?? 300_000),
      });
    } catch (err) {
      throw new ClippingApiError(`Clipping API request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!resp.ok) {
      const body = await resp.text();
      throw new ClippingApiError(`Clipping API error ${resp.status}: ${body.slice(0, 200)}`);
    }

    let payload: unknown;
    try {
      payload = await resp.json();
    } catch (err) {
      throw new ClippingApiError(`Clipping API returned invalid JSON: ${errorMessage(err)}`, { cause: err });
    }
    const parsed = AnalyzeResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ClippingApiError(`Unexpected clipping API response: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const intervals = parsed.data.segments
      .filter((s) => s.end_time > s.start_time)
      .map((s) => ({ start: s.start_time, end: s.end_time, score: s.action_score ?? 0.5 }));
    logger.info('Clipping API returned segments', { count: intervals.length });
    return intervals;
  }
}
