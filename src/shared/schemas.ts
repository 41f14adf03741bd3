import { z } from 'zod';

const CaptionCandidateSchema = z.object({
  caption: z.string(),
  hashtags: z.array(z.string()),
});

const DEFAULT_FALLBACK_HASHTAGS = ['#viral', '#trending', '#reels', '#fyp', '#foryou'];

// {topic} and {description} are substituted when the fallback set is used.
const DEFAULT_FALLBACK_CAPTIONS = [
  'Wait for it... 🔥 This {topic} content is INSANE!',
  "You won't believe this! 😱 {description}",
  'Obsessed with this! 💯 Tag someone who needs to see this 👇',
  'Game changer! 🎯 Save this for later!',
  "This is why I'm obsessed! 🔥 What do you think? Comment below! 👇",
].map((caption) => ({ caption, hashtags: DEFAULT_FALLBACK_HASHTAGS }));

export const ReelConfigSchema = z.object({
  version: z.string().default('1'),
  clip: z
    .object({
      length_seconds: z.number().positive().default(30),
      per_video: z.number().int().positive().default(3),
      width: z.number().int().positive().default(1080),
      height: z.number().int().positive().default(1920),
      bitrate: z.string().default('5000k'),
      codec: z.string().default('libx264'),
    })
    .default({}),
  selection: z
    .object({
      score_window_seconds: z.number().positive().default(5),
      motion_threshold: z.number().min(0).max(1).default(0.15),
      min_spacing_seconds: z.number().min(0).default(30),
      sample_fps: z.number().positive().default(2),
      clipping_api: z
        .object({
          enabled: z.boolean().default(false),
          url: z.string().default('https://api.vidyo.ai/v1/clips'),
          min_seconds: z.number().positive().default(15),
          max_seconds: z.number().positive().default(60),
        })
        .default({}),
    })
    .default({}),
  captions: z
    .object({
      count: z.number().int().positive().default(5),
      max_length: z.number().int().positive().default(150),
      hashtag_count: z.number().int().min(0).default(5),
      topic: z.string().default('viral content'),
      api_base: z.string().default('https://api.openai.com/v1'),
      model: z.string().default('gpt-4o-mini'),
      fallback: z.array(CaptionCandidateSchema).min(1).default(DEFAULT_FALLBACK_CAPTIONS),
    })
    .default({}),
  approval: z
    .object({
      enabled: z.boolean().default(true),
      gateway_url: z.string().default('http://127.0.0.1:18789/api/message'),
      recipient: z.string().default(''),
    })
    .default({}),
  notifications: z
    .object({
      enabled: z.boolean().default(true),
    })
    .default({}),
  monitor: z
    .object({
      default_interval_minutes: z.number().positive().default(60),
      recent_videos: z.number().int().positive().default(5),
    })
    .default({}),
  posting: z
    .object({
      max_posts_per_run: z.number().int().positive().default(5),
      min_delay_minutes: z.number().min(0).default(30),
      max_delay_minutes: z.number().min(0).default(120),
      graph_api_base: z.string().default('https://graph.facebook.com/v19.0'),
      media_base_url: z.string().default(''),
      default_account: z.string().default(''),
      accounts: z.record(z.string()).default({}),
    })
    .default({}),
  payments: z
    .object({
      checkout_base: z.string().default('https://whop.com/checkout'),
      pricing: z
        .object({
          per_clip: z.number().min(0).default(5),
          per_video: z.number().min(0).default(15),
          monthly: z.number().min(0).default(50),
        })
        .default({}),
    })
    .default({}),
  tools: z
    .object({
      ffmpeg_bin: z.string().default('ffmpeg'),
      ffprobe_bin: z.string().default('ffprobe'),
      ytdlp_bin: z.string().default('yt-dlp'),
    })
    .default({}),
});

export const CreatorSchema = z.object({
  name: z.string().min(1),
  channel_url: z.string().min(1),
  destination_handle: z.string(),
  payment_link: z.string().nullable(),
  check_interval_minutes: z.number().positive(),
  last_checked: z.string().nullable(),
  clips_per_video: z.number().int().positive(),
  active: z.boolean(),
  added_at: z.string(),
});

export const CreatorRegistryFileSchema = z.array(CreatorSchema);

export const ProcessedVideoSchema = z.object({
  platform: z.string(),
  video_id: z.string(),
  creator_name: z.string(),
  timestamp: z.string(),
  clip_count: z.number().int().min(0),
});

export const LedgerFileSchema = z.array(ProcessedVideoSchema);

export const ApprovalStatusSchema = z.enum(['pending', 'approved', 'rejected', 'not_required']);

export const ClipMetadataSchema = z.object({
  source_url: z.string(),
  source_title: z.string(),
  source_video_id: z.string(),
  creator_name: z.string().nullable(),
  clip_index: z.number().int().positive(),
  start_time: z.number(),
  end_time: z.number(),
  duration: z.number(),
  score: z.number(),
  created_at: z.string(),
  aspect_ratio: z.string(),
  resolution: z.string(),
  campaign_id: z.string().nullable().default(null),
});

export const ClipBundleSchema = z.object({
  clip_id: z.string(),
  date: z.string(),
  video_path: z.string(),
  captions: z.array(CaptionCandidateSchema),
  metadata: ClipMetadataSchema,
  approval_status: ApprovalStatusSchema,
  approval_response: z.unknown().nullable(),
  approval_error: z.string().nullable(),
  decided_at: z.string().nullable(),
  posted_at: z.string().nullable(),
  post_id: z.string().nullable(),
});

export const BundleSummarySchema = z.object({
  clip_id: z.string(),
  video_path: z.string(),
  metadata_path: z.string(),
  caption: z.string(),
  creator_name: z.string().nullable(),
  source_url: z.string(),
  start_time: z.number(),
  end_time: z.number(),
  approval_status: ApprovalStatusSchema,
});

export const ManifestSchema = z.object({
  date: z.string(),
  timestamp: z.string(),
  total_count: z.number().int().min(0),
  clips: z.array(BundleSummarySchema),
});

export const PaymentRecordSchema = z.object({
  link: z.string(),
  amount: z.number(),
  video_title: z.string(),
  num_clips: z.number().int().min(0),
  created_at: z.string(),
  status: z.enum(['pending', 'completed']),
  completed_at: z.string().nullable(),
});

export const PaymentsFileSchema = z.object({
  creators: z.record(
    z.object({
      payment_links: z.array(PaymentRecordSchema),
      total_earned: z.number(),
      total_clips: z.number().int().min(0),
    }),
  ),
});

export const CAMPAIGN_SOURCE_TYPES = [
  'youtube_longform',
  'youtube_shorts',
  'google_drive',
  'twitch_vod',
  'kick_clip',
] as const;

export const CampaignSourceTypeSchema = z.enum(CAMPAIGN_SOURCE_TYPES);

export const CampaignTaggingSchema = z.object({
  required: z.boolean().default(false),
  tags: z.array(z.string()).default([]),
});

export const CampaignSchema = z.object({
  campaign_id: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, 'campaign ids use lowercase letters, digits, - and _'),
  campaign_name: z.string().min(1),
  whop_campaign_url: z.string().default(''),
  clipping_rules: z
    .object({
      critical: z.array(z.string()).default([]),
      focus_on: z.array(z.string()).default([]),
      goal: z.string().default('attention + excitement'),
    })
    .default({}),
  approved_sources: z.record(CampaignSourceTypeSchema, z.array(z.string())).default({}),
  tagging_requirements: z.record(CampaignTaggingSchema).default({}),
  caption_guidelines: z
    .object({
      style: z.string().default('flexible, engaging'),
      tone: z.string().default('exciting'),
    })
    .default({}),
  requirements: z
    .object({
      keep_live_days: z.number().int().positive().default(30),
      min_engagement_rate: z.number().min(0).default(0.01),
    })
    .default({}),
});
