import { existsSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { CAMPAIGN_SOURCE_TYPES, CampaignSchema } from '../shared/schemas.js';
import { ConfigError, NotFoundError } from '../shared/errors.js';
import { extractYoutubeId } from '../shared/ids.js';
import { errorMessage, logger } from '../shared/logger.js';
import { readJsonFile, writeJsonAtomic } from '../workspace/json-file.js';
import type { Campaign, CampaignInput, CampaignSourceType } from '../workspace/types.js';

export const GUIDELINES_FILE = 'guidelines.json';

export interface CaptionRequirements {
  required: boolean;
  tags: string[];
  style: string;
  tone: string;
}

export interface CampaignSourceEntry {
  type: CampaignSourceType;
  url: string;
}

export function isCampaignSourceType(value: string): value is CampaignSourceType {
  return CAMPAIGN_SOURCE_TYPES.some((t) => t === value);
}

/**
 * Parse `type:url` or a bare URL whose type can be told from its host.
 * `https://…` is never read as a type prefix.
 */
export function parseSourceEntry(entry: string): CampaignSourceEntry {
  const trimmed = entry.trim();
  const sep = trimmed.indexOf(':');
  if (sep > 0) {
    const prefix = trimmed.slice(0, sep);
    if (isCampaignSourceType(prefix)) {
      return { type: prefix, url: trimmed.slice(sep + 1).trim() };
    }
  }
  const lower = trimmed.toLowerCase();
  if (lower.includes('youtube.com') || lower.includes('youtu.be')) {
    return { type: lower.includes('/shorts/') ? 'youtube_shorts' : 'youtube_longform', url: trimmed };
  }
  if (lower.includes('drive.google.com')) return { type: 'google_drive', url: trimmed };
  if (lower.includes('twitch.tv')) return { type: 'twitch_vod', url: trimmed };
  if (lower.includes('kick.com')) return { type: 'kick_clip', url: trimmed };
  throw new ConfigError(`Cannot tell the source type of "${entry}". Use ${CAMPAIGN_SOURCE_TYPES.join('|')}:<url>`);
}

/**
 * Whether `url` is covered by one approved source entry. Entries match when
 * either URL contains the other or both name the same YouTube video. Drive
 * entries approve any Drive link, since shared files do not carry their folder.
 */
export function sourceMatches(url: string, approved: string): boolean {
  if (url.includes(approved) || approved.includes(url)) return true;

  const urlId = extractYoutubeId(url);
  if (urlId && urlId === extractYoutubeId(approved)) return true;

  return url.toLowerCase().includes('drive.google.com') && approved.toLowerCase().includes('drive.google.com');
}

/**
 * Campaign guidelines, one folder per campaign under `.reelrunner/campaigns/`
 * holding a `guidelines.json`. Files are read on every call so edits made by
 * hand are picked up without a restart.
 */
export class CampaignRegistry {
  constructor(private readonly dir: string) {}

  guidelinesPath(campaignId: string): string {
    return join(this.dir, campaignId, GUIDELINES_FILE);
  }

  /** Valid campaigns sorted by id. Unreadable guideline files are logged and left out. */
  list(): Campaign[] {
    if (!existsSync(this.dir)) return [];
    const out: Campaign[] = [];
    for (const entry of readdirSync(this.dir, { withFileTypes: true })) {
      if (!entry.isDirectory()) continue;
      try {
        const campaign = this.find(entry.name);
        if (campaign) out.push(campaign);
      } catch (err) {
        logger.error('Skipping campaign with invalid guidelines', { campaign: entry.name, error: errorMessage(err) });
      }
    }
    return out.sort((a, b) => a.campaign_id.localeCompare(b.campaign_id));
  }

  find(campaignId: string): Campaign | null {
    return readJsonFile(this.guidelinesPath(campaignId), CampaignSchema, null);
  }

  get(campaignId: string): Campaign {
    const campaign = this.find(campaignId);
    if (!campaign) throw new NotFoundError('campaign', campaignId);
    return campaign;
  }

  create(input: CampaignInput, opts: { force?: boolean } = {}): Campaign {
    const parsed = CampaignSchema.safeParse(input);
    if (!parsed.success) {
      throw new ConfigError(`Invalid campaign: ${parsed.error.issues[0]?.message ?? 'schema mismatch'}`);
    }
    const campaign = parsed.data;
    const filePath = this.guidelinesPath(campaign.campaign_id);
    if (existsSync(filePath) && !opts.force) {
      throw new ConfigError(`Campaign already exists: ${campaign.campaign_id}. Use --force to overwrite.`);
    }
    writeJsonAtomic(filePath, campaign);
    logger.info('Campaign saved', { campaign: campaign.campaign_id, path: filePath });
    return campaign;
  }

  validateSourceUrl(url: string, campaignId: string): boolean {
    const campaign = this.get(campaignId);
    return Object.values(campaign.approved_sources).some((urls) =>
      (urls ?? []).some((approved) => sourceMatches(url, approved)),
    );
  }

  captionRequirements(campaignId: string, platform = 'instagram'): CaptionRequirements {
    const campaign = this.get(campaignId);
    const tagging = campaign.tagging_requirements[platform];
    return {
      required: tagging?.required ?? false,
      tags: tagging?.tags ?? [],
      style: campaign.caption_guidelines.style,
      tone: campaign.caption_guidelines.tone,
    };
  }
}
