import { ClippingApiClient } from '../connector/clipping/api.js';
import { FfmpegToolkit } from '../connector/ffmpeg/ffmpeg.js';
import { GatewayBridge } from '../connector/gateway/bridge.js';
import { GraphReelsPublisher } from '../connector/instagram/reels.js';
import { LlmCaptionService } from '../connector/llm/captions.js';
import { YtDlpChannelLister, YtDlpDownloader } from '../connector/youtube/ytdlp.js';
import { ApprovalTracker } from '../governance/approvals.js';
import { ClipBundler } from '../pipeline/bundler.js';
import { CampaignProcessor } from '../pipeline/campaigns.js';
import { VideoProcessor } from '../pipeline/processor.js';
import { SegmentSelector } from '../pipeline/segments.js';
import { BundleStore } from '../store/bundles.js';
import { CampaignRegistry } from '../store/campaigns.js';
import { CreatorRegistry } from '../store/creators.js';
import { ProcessedVideoLedger } from '../store/ledger.js';
import { ManifestWriter } from '../store/manifest.js';
import { PaymentTracker } from '../store/payments.js';
import { systemClock, type Clock } from './clock.js';
import { CreatorMonitor } from './monitor.js';
import { ApprovedPoster } from './poster.js';
import type {
  CaptionService,
  ChannelLister,
  ClippingApi,
  DurationReader,
  MessagingGateway,
  MotionScorer,
  Publisher,
  Transcoder,
  VideoDownloader,
} from '../connector/types.js';
import type { Secrets } from '../workspace/config.js';
import type { ReelConfig, ReelPaths } from '../workspace/types.js';

/** Collaborators that can be swapped out, mostly for tests. */
export interface CollaboratorOverrides {
  clock?: Clock;
  channels?: ChannelLister;
  downloader?: VideoDownloader;
  durationReader?: DurationReader;
  scorer?: MotionScorer;
  transcoder?: Transcoder;
  clippingApi?: ClippingApi | null;
  captions?: CaptionService;
  gateway?: MessagingGateway | null;
  publisher?: Publisher;
}

export interface Services {
  paths: ReelPaths;
  config: ReelConfig;
  clock: Clock;
  registry: CreatorRegistry;
  ledger: ProcessedVideoLedger;
  bundles: BundleStore;
  manifests: ManifestWriter;
  payments: PaymentTracker;
  campaigns: CampaignRegistry;
  approvals: ApprovalTracker;
  gateway: MessagingGateway | null;
  selector: SegmentSelector;
  bundler: ClipBundler;
  processor: VideoProcessor;
  campaignProcessor: CampaignProcessor;
  monitor: CreatorMonitor;
  poster: ApprovedPoster;
}

/** Wire stores, collaborators and runtime components for one workspace. */
export function buildServices(
  paths: ReelPaths,
  config: ReelConfig,
  secrets: Secrets,
  overrides: CollaboratorOverrides = {},
): Services {
  const clock = overrides.clock ?? systemClock;
  const now = () => clock.now();

  const ffmpeg = new FfmpegToolkit({
    ffmpegBin: config.tools.ffmpeg_bin,
    ffprobeBin: config.tools.ffprobe_bin,
    sampleFps: config.selection.sample_fps,
  });

  const gateway =
    overrides.gateway !== undefined
      ? overrides.gateway
      : config.approval.gateway_url
        ? new GatewayBridge({
            url: config.approval.gateway_url,
            recipient: config.approval.recipient,
            token: secrets.gatewayToken,
          })
        : null;

  const clippingApi =
    overrides.clippingApi !== undefined
      ? overrides.clippingApi
      : config.selection.clipping_api.enabled
        ? new ClippingApiClient({ url: config.selection.clipping_api.url, apiKey: secrets.clippingApiKey })
        : null;

  const registry = new CreatorRegistry(
    paths.creators,
    {
      checkIntervalMinutes: config.monitor.default_interval_minutes,
      clipsPerVideo: config.clip.per_video,
    },
    now,
  );
  const ledger = new ProcessedVideoLedger(paths.ledger, now);
  const bundles = new BundleStore(paths.outputDir);
  const manifests = new ManifestWriter(paths.outputDir, now);
  const payments = new PaymentTracker(paths.payments, config.payments, now);
  const campaigns = new CampaignRegistry(paths.campaignsDir);
  const approvals = new ApprovalTracker(bundles, gateway, now);

  const selector = new SegmentSelector({
    scorer: overrides.scorer ?? ffmpeg,
    clippingApi,
    options: {
      clipLength: config.clip.length_seconds,
      windowSeconds: config.selection.score_window_seconds,
      threshold: config.selection.motion_threshold,
      minSpacing: config.selection.min_spacing_seconds,
    },
    apiBounds: {
      minSeconds: config.selection.clipping_api.min_seconds,
      maxSeconds: config.selection.clipping_api.max_seconds,
    },
  });

  const bundler = new ClipBundler({
    transcoder: overrides.transcoder ?? ffmpeg,
    captions:
      overrides.captions ??
      new LlmCaptionService({
        apiBase: config.captions.api_base,
        model: config.captions.model,
        apiKey: secrets.llmApiKey,
        maxLength: config.captions.max_length,
        count: config.captions.count,
        hashtagCount: config.captions.hashtag_count,
      }),
    approvals,
    bundles,
    manifests,
    config,
    outputDir: paths.outputDir,
    now,
  });

  const processor = new VideoProcessor({
    downloader: overrides.downloader ?? new YtDlpDownloader({ bin: config.tools.ytdlp_bin }),
    durationReader: overrides.durationReader ?? ffmpeg,
    selector,
    bundler,
    workDir: paths.workDir,
  });

  const campaignProcessor = new CampaignProcessor({
    campaigns,
    ledger,
    pipeline: processor,
    defaultClipCount: config.clip.per_video,
  });

  const monitor = new CreatorMonitor({
    registry,
    ledger,
    channels: overrides.channels ?? new YtDlpChannelLister({ bin: config.tools.ytdlp_bin }),
    pipeline: processor,
    clock,
    recentVideos: config.monitor.recent_videos,
    defaultIntervalMinutes: config.monitor.default_interval_minutes,
    notifier: config.notifications.enabled ? gateway : null,
  });

  const poster = new ApprovedPoster({
    bundles,
    manifests,
    registry,
    clock,
    posting: config.posting,
    publisher:
      overrides.publisher ??
      new GraphReelsPublisher({
        graphApiBase: config.posting.graph_api_base,
        accessToken: secrets.instagramAccessToken,
        mediaBaseUrl: config.posting.media_base_url,
        outputDir: paths.outputDir,
        accounts: config.posting.accounts,
        defaultAccount: config.posting.default_account,
      }),
  });

  return {
    paths,
    config,
    clock,
    registry,
    ledger,
    bundles,
    manifests,
    payments,
    campaigns,
    approvals,
    gateway,
    selector,
    bundler,
    processor,
    campaignProcessor,
    monitor,
    poster,
  };
}
