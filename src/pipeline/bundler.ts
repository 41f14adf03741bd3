import { join } from 'node:path';
import { clipId as makeClipId } from '../shared/ids.js';
import { GatewayError } from '../shared/errors.js';
import { errorMessage, logger } from '../shared/logger.js';
import { fallbackCaptions, formatCaptionText } from '../connector/llm/captions.js';
import { formatDay, getDayPaths } from '../workspace/paths.js';
import type { ApprovalTracker } from '../governance/approvals.js';
import type { BundleStore } from '../store/bundles.js';
import type { ManifestWriter } from '../store/manifest.js';
import type { CaptionService, Interval, Transcoder } from '../connector/types.js';
import type { BundleSummary, CaptionCandidate, ClipBundle, ReelConfig } from '../workspace/types.js';

export interface SourceVideo {
  id: string;
  url: string;
  title: string;
  description: string;
  path: string;
  creatorName: string | null;
  campaign?: CampaignContext | null;
}

/** Caption rules of the campaign a video is clipped for. */
export interface CampaignContext {
  id: string;
  name: string;
  tags: string[];
  tone: string;
  style: string;
}

export interface SkippedClip {
  ordinal: number;
  start: number;
  end: number;
  error: string;
}

export interface SubmissionFailure {
  clip_id: string;
  error: string;
}

export interface BundleRunResult {
  bundles: ClipBundle[];
  skipped: SkippedClip[];
  submissionFailures: SubmissionFailure[];
}

export interface ClipBundlerDeps {
  transcoder: Transcoder;
  captions: CaptionService;
  approvals: ApprovalTracker;
  bundles: BundleStore;
  manifests: ManifestWriter;
  config: Pick<ReelConfig, 'clip' | 'captions' | 'approval'>;
  outputDir: string;
  now?: () => Date;
}

/** Append campaign tags each caption does not already carry. */
export function applyCampaignTags(captions: CaptionCandidate[], tags: readonly string[]): CaptionCandidate[] {
  if (tags.length === 0) return captions;
  return captions.map((c) => ({
    caption: c.caption,
    hashtags: [...c.hashtags, ...tags.filter((t) => !c.hashtags.includes(t))],
  }));
}

export function summarizeBundle(bundle: ClipBundle, metadataPath: string): BundleSummary {
  return {
    clip_id: bundle.clip_id,
    video_path: bundle.video_path,
    metadata_path: metadataPath,
    caption: formatCaptionText(bundle.captions[0]),
    creator_name: bundle.metadata.creator_name,
    source_url: bundle.metadata.source_url,
    start_time: bundle.metadata.start_time,
    end_time: bundle.metadata.end_time,
    approval_status: bundle.approval_status,
  };
}

/**
 * Turns selected intervals of one source video into clip bundles: clip file,
 * caption candidates, metadata record, approval request and manifest entry.
 * Transcode failures skip a single interval; store write failures propagate.
 */
export class ClipBundler {
  private readonly now: () => Date;

  constructor(private readonly deps: ClipBundlerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async bundle(source: SourceVideo, intervals: readonly Interval[]): Promise<BundleRunResult> {
    const result: BundleRunResult = { bundles: [], skipped: [], submissionFailures: [] };
    const { clip, approval } = this.deps.config;

    for (const [i, interval] of intervals.entries()) {
      const ordinal = i + 1;
      const createdAt = this.now();
      const date = formatDay(createdAt);
      const id = this.uniqueClipId(makeClipId(source.id, ordinal, interval.score));
      const day = getDayPaths(this.deps.outputDir, date);

      let videoPath: string;
      try {
        videoPath = await this.deps.transcoder.transcode({
          sourcePath: source.path,
          outputPath: join(day.clipsDir, `${id}.mp4`),
          start: interval.start,
          end: interval.end,
          width: clip.width,
          height: clip.height,
          bitrate: clip.bitrate,
          codec: clip.codec,
        });
      } catch (err) {
        const error = errorMessage(err);
        logger.warn('Skipping clip', { clip_id: id, error });
        result.skipped.push({ ordinal, start: interval.start, end: interval.end, error });
        continue;
      }

      const duration = Math.round((interval.end - interval.start) * 1000) / 1000;
      const captions = await this.captionsFor(source, interval, duration);

      let bundle: ClipBundle = {
        clip_id: id,
        date,
        video_path: videoPath,
        captions,
        metadata: {
          source_url: source.url,
          source_title: source.title,
          source_video_id: source.id,
          creator_name: source.creatorName,
          clip_index: ordinal,
          start_time: interval.start,
          end_time: interval.end,
          duration,
          score: interval.score,
          created_at: createdAt.toISOString(),
          aspect_ratio: '9:16',
          resolution: `${clip.width}x${clip.height}`,
          campaign_id: source.campaign?.id ?? null,
        },
        approval_status: approval.enabled ? 'pending' : 'not_required',
        approval_response: null,
        approval_error: null,
        decided_at: null,
        posted_at: null,
        post_id: null,
      };
      const metadataPath = this.deps.bundles.save(bundle);

      if (approval.enabled) {
        try {
          bundle = await this.deps.approvals.submit(id);
        } catch (err) {
          if (!(err instanceof GatewayError)) throw err;
          result.submissionFailures.push({ clip_id: id, error: err.message });
          bundle = this.deps.bundles.get(id);
        }
      }

      this.deps.manifests.append(date, summarizeBundle(bundle, metadataPath));
      result.bundles.push(bundle);
      logger.info('Clip bundled', { clip_id: id, status: bundle.approval_status });
    }

    return result;
  }

  /**
   * A rerun of the same video must not overwrite records that may already be
   * decided or posted, so taken ids get a `_rN` suffix.
   */
  private uniqueClipId(base: string): string {
    if (!this.deps.bundles.find(base)) return base;
    for (let run = 2; ; run++) {
      const candidate = `${base}_r${run}`;
      if (!this.deps.bundles.find(candidate)) return candidate;
    }
  }

  private async captionsFor(source: SourceVideo, interval: Interval, duration: number): Promise<CaptionCandidate[]> {
    const { captions } = this.deps.config;
    const { campaign } = source;
    const description = campaign
      ? `${source.title} - ${campaign.id} campaign`
      : source.creatorName
        ? `${source.creatorName} - ${source.title}`
        : source.title;
    const context = campaign
      ? `Campaign: ${campaign.name}. Content: ${source.title}. Tone: ${campaign.tone}. Style: ${campaign.style}`
      : `High-action segment (motion score: ${interval.score.toFixed(2)}, duration: ${duration.toFixed(1)}s)`;

    let generated: CaptionCandidate[];
    try {
      generated = await this.deps.captions.generate({ description, topic: captions.topic, context, count: captions.count });
    } catch (err) {
      logger.warn('Caption service failed; using fallback captions', { error: errorMessage(err) });
      generated = fallbackCaptions(captions.fallback, { topic: captions.topic, description }, captions.count);
    }
    return applyCampaignTags(generated, campaign?.tags ?? []);
  }
}
