import { StoreWriteError, UnapprovedSourceError } from '../shared/errors.js';
import { extractYoutubeId } from '../shared/ids.js';
import { errorMessage, logger } from '../shared/logger.js';
import type { CampaignRegistry } from '../store/campaigns.js';
import type { ProcessedVideoLedger } from '../store/ledger.js';
import type { Campaign, CampaignSourceType } from '../workspace/types.js';
import type { BundleRunResult, CampaignContext } from './bundler.js';
import type { VideoPipeline } from './processor.js';

/** Source types that can be downloaded and checked for new uploads. */
const MONITORED_SOURCE_TYPES: readonly CampaignSourceType[] = ['youtube_longform', 'youtube_shorts'];

export interface CampaignSource {
  url: string;
  video_id: string;
  source_type: CampaignSourceType;
}

export interface CampaignItemOutcome {
  url: string;
  video_id: string;
  status: 'processed' | 'failed';
  clip_count: number;
  error?: string;
}

export interface CampaignProcessorDeps {
  campaigns: CampaignRegistry;
  ledger: ProcessedVideoLedger;
  pipeline: VideoPipeline;
  defaultClipCount: number;
}

/** Ledger platform for campaign sources, so they never collide with creator uploads. */
export function campaignPlatform(campaignId: string): string {
  return `campaign:${campaignId}`;
}

export function campaignContext(campaign: Campaign, platform = 'instagram'): CampaignContext {
  return {
    id: campaign.campaign_id,
    name: campaign.campaign_name,
    tags: campaign.tagging_requirements[platform]?.tags ?? [],
    tone: campaign.caption_guidelines.tone,
    style: campaign.caption_guidelines.style,
  };
}

/**
 * Clips videos for a campaign: the source URL must be approved by the
 * campaign and captions carry its tags. Approved YouTube sources can also be
 * worked off as a queue, tracked in the processed-video ledger.
 */
export class CampaignProcessor {
  constructor(private readonly deps: CampaignProcessorDeps) {}

  async processForCampaign(
    campaignId: string,
    url: string,
    opts: { videoId: string; clipCount?: number; title?: string },
  ): Promise<BundleRunResult> {
    const campaign = this.deps.campaigns.get(campaignId);
    if (!this.deps.campaigns.validateSourceUrl(url, campaignId)) {
      throw new UnapprovedSourceError(url, campaignId);
    }
    logger.info('Processing video for campaign', { campaign: campaignId, url });
    return this.deps.pipeline.processVideo({
      video_id: opts.videoId,
      url,
      title: opts.title ?? '',
      creatorName: null,
      clipCount: opts.clipCount ?? this.deps.defaultClipCount,
      campaign: campaignContext(campaign),
    });
  }

  /** Approved YouTube sources not yet clipped for this campaign, first listing wins. */
  pendingSources(campaignId: string): CampaignSource[] {
    const campaign = this.deps.campaigns.get(campaignId);
    const platform = campaignPlatform(campaignId);
    const seen = new Set<string>();
    const out: CampaignSource[] = [];
    for (const sourceType of MONITORED_SOURCE_TYPES) {
      for (const url of campaign.approved_sources[sourceType] ?? []) {
        const videoId = extractYoutubeId(url);
        if (!videoId || seen.has(videoId) || this.deps.ledger.has(videoId, platform)) continue;
        seen.add(videoId);
        out.push({ url, video_id: videoId, source_type: sourceType });
      }
    }
    return out;
  }

  /**
   * Clip up to `maxItems` pending sources. A failed source is reported and
   * retried next time; store write failures abort the run.
   */
  async processPending(campaignId: string, maxItems = 5, clipCount?: number): Promise<CampaignItemOutcome[]> {
    const pending = this.pendingSources(campaignId).slice(0, maxItems);
    if (pending.length === 0) {
      logger.info('No new campaign content', { campaign: campaignId });
    }

    const outcomes: CampaignItemOutcome[] = [];
    for (const source of pending) {
      let result: BundleRunResult;
      try {
        result = await this.processForCampaign(campaignId, source.url, { videoId: source.video_id, clipCount });
      } catch (err) {
        if (err instanceof StoreWriteError) throw err;
        const error = errorMessage(err);
        logger.error('Campaign source failed', { campaign: campaignId, url: source.url, error });
        outcomes.push({ url: source.url, video_id: source.video_id, status: 'failed', clip_count: 0, error });
        continue;
      }
      this.deps.ledger.markProcessed(source.video_id, campaignId, result.bundles.length, campaignPlatform(campaignId));
      outcomes.push({
        url: source.url,
        video_id: source.video_id,
        status: 'processed',
        clip_count: result.bundles.length,
      });
    }
    return outcomes;
  }
}
