/**
 * Creator monitoring loop.
 *
 * One cycle walks the registry in order, lists each creator's latest uploads,
 * runs the video pipeline for anything not yet in the ledger and records the
 * result. Failures are contained per creator and per video, except store
 * write failures, which abort the cycle.
 */
import { StoreWriteError } from '../shared/errors.js';
import { errorMessage, logger } from '../shared/logger.js';
import type { ChannelLister, ChannelVideo, MessagingGateway } from '../connector/types.js';
import type { BundleRunResult } from '../pipeline/bundler.js';
import type { VideoPipeline } from '../pipeline/processor.js';
import type { CreatorRegistry } from '../store/creators.js';
import type { ProcessedVideoLedger } from '../store/ledger.js';
import type { Creator } from '../workspace/types.js';
import type { Clock } from './clock.js';

const MINUTE_MS = 60_000;
const MIN_SLEEP_MS = 1_000;

export interface VideoOutcome {
  video_id: string;
  title: string;
  status: 'processed' | 'failed';
  clip_count: number;
  skipped_clips: number;
  approval_failures: number;
  error?: string;
}

export type CreatorStatus = 'ok' | 'failed' | 'not_due' | 'inactive';

export interface CreatorOutcome {
  name: string;
  status: CreatorStatus;
  new_videos: number;
  videos: VideoOutcome[];
  error?: string;
}

export interface CycleReport {
  started_at: string;
  finished_at: string;
  cancelled: boolean;
  creators: CreatorOutcome[];
}

export interface CycleOptions {
  /** Restrict the cycle to one creator; it is checked even when inactive. */
  creatorName?: string;
  /** Skip creators whose check interval has not elapsed. */
  onlyDue?: boolean;
  signal?: AbortSignal;
}

export interface RunOptions {
  signal: AbortSignal;
  /** Fixed minutes between cycles; every creator is checked each cycle. */
  intervalMinutes?: number;
  onCycle?: (report: CycleReport) => void;
}

export interface CreatorMonitorDeps {
  registry: CreatorRegistry;
  ledger: ProcessedVideoLedger;
  channels: ChannelLister;
  pipeline: VideoPipeline;
  clock: Clock;
  recentVideos: number;
  defaultIntervalMinutes: number;
  /** Receives a text notice after each video that produced clips. */
  notifier?: MessagingGateway | null;
}

export function isDue(creator: Creator, now: Date): boolean {
  if (!creator.last_checked) return true;
  return Date.parse(creator.last_checked) + creator.check_interval_minutes * MINUTE_MS <= now.getTime();
}

export function notificationText(creator: Creator, video: ChannelVideo, result: BundleRunResult): string {
  const lines = [
    `🎬 New clips ready from ${creator.name}!`,
    '',
    `Video: ${video.title}`,
    `Clips processed: ${result.bundles.length}`,
  ];
  if (creator.payment_link) {
    lines.push('', `💰 Share this link with creator for payment: ${creator.payment_link}`);
  }
  lines.push('', '✅ Ready to post to Instagram!');
  return lines.join('\n');
}

/** First occurrence of each (platform, video_id) in listing order. */
export function uniqueVideos(videos: readonly ChannelVideo[]): ChannelVideo[] {
  const seen = new Set<string>();
  return videos.filter((v) => {
    const key = `${v.platform}:${v.video_id}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export class CreatorMonitor {
  constructor(private readonly deps: CreatorMonitorDeps) {}

  /** One immediate cycle over every creator, or only `creatorName`. */
  async check(creatorName?: string, signal?: AbortSignal): Promise<CycleReport> {
    return this.runCycle({ creatorName, signal });
  }

  async runCycle(opts: CycleOptions = {}): Promise<CycleReport> {
    const { registry, clock } = this.deps;
    const started = clock.now();
    const creators = opts.creatorName ? [registry.get(opts.creatorName)] : [...registry.list()];
    const report: CycleReport = {
      started_at: started.toISOString(),
      finished_at: started.toISOString(),
      cancelled: false,
      creators: [],
    };

    for (const creator of creators) {
      if (opts.signal?.aborted) {
        report.cancelled = true;
        break;
      }
      if (!creator.active && !opts.creatorName) {
        report.creators.push({ name: creator.name, status: 'inactive', new_videos: 0, videos: [] });
        continue;
      }
      if (opts.onlyDue && !isDue(creator, clock.now())) {
        report.creators.push({ name: creator.name, status: 'not_due', new_videos: 0, videos: [] });
        continue;
      }

      const outcome = await this.checkCreator(creator);
      registry.touch(creator.name, clock.now());
      report.creators.push(outcome);
    }

    report.finished_at = clock.now().toISOString();
    return report;
  }

  /**
   * Cycles until `signal` aborts. Without a fixed interval only due creators
   * are checked and the loop sleeps until the next one falls due.
   */
  async run(opts: RunOptions): Promise<void> {
    const { signal, intervalMinutes } = opts;
    logger.info('Monitor started', { interval_minutes: intervalMinutes ?? 'per-creator' });
    while (!signal.aborted) {
      const report = await this.runCycle({ onlyDue: intervalMinutes === undefined, signal });
      opts.onCycle?.(report);
      if (signal.aborted) break;

      const waitMs = this.nextDelayMs(intervalMinutes);
      logger.info('Next check scheduled', { in_minutes: Math.round((waitMs / MINUTE_MS) * 10) / 10 });
      await this.deps.clock.sleep(waitMs, signal);
    }
    logger.info('Monitor stopped');
  }

  nextDelayMs(intervalMinutes?: number): number {
    if (intervalMinutes !== undefined) return intervalMinutes * MINUTE_MS;

    const now = this.deps.clock.now().getTime();
    let earliest: number | null = null;
    for (const creator of this.deps.registry.list()) {
      if (!creator.active) continue;
      const due = creator.last_checked
        ? Date.parse(creator.last_checked) + creator.check_interval_minutes * MINUTE_MS
        : now;
      earliest = earliest === null ? due : Math.min(earliest, due);
    }
    if (earliest === null) return this.deps.defaultIntervalMinutes * MINUTE_MS;
    return Math.max(MIN_SLEEP_MS, earliest - now);
  }

  private async checkCreator(creator: Creator): Promise<CreatorOutcome> {
    const { channels, ledger, recentVideos } = this.deps;
    logger.info('Checking creator', { creator: creator.name });

    let videos: ChannelVideo[];
    try {
      videos = await channels.listRecent(creator.channel_url, recentVideos);
    } catch (err) {
      const error = errorMessage(err);
      logger.error('Channel listing failed', { creator: creator.name, error });
      return { name: creator.name, status: 'failed', new_videos: 0, videos: [], error };
    }

    const fresh = uniqueVideos(videos).filter((v) => !ledger.has(v.video_id, v.platform));
    const outcome: CreatorOutcome = { name: creator.name, status: 'ok', new_videos: fresh.length, videos: [] };
    if (fresh.length === 0) {
      logger.info('No new videos', { creator: creator.name });
    }

    for (const video of fresh) {
      // The ledger can change while earlier videos in this listing run.
      if (ledger.has(video.video_id, video.platform)) continue;
      outcome.videos.push(await this.processVideo(creator, video));
    }
    return outcome;
  }

  private async processVideo(creator: Creator, video: ChannelVideo): Promise<VideoOutcome> {
    let result: BundleRunResult;
    try {
      result = await this.deps.pipeline.processVideo({
        video_id: video.video_id,
        url: video.url,
        title: video.title,
        creatorName: creator.name,
        clipCount: creator.clips_per_video,
      });
    } catch (err) {
      if (err instanceof StoreWriteError) throw err;
      const error = errorMessage(err);
      logger.error('Video failed', { creator: creator.name, video_id: video.video_id, error });
      return {
        video_id: video.video_id,
        title: video.title,
        status: 'failed',
        clip_count: 0,
        skipped_clips: 0,
        approval_failures: 0,
        error,
      };
    }

    this.deps.ledger.markProcessed(video.video_id, creator.name, result.bundles.length, video.platform);
    await this.notify(creator, video, result);
    return {
      video_id: video.video_id,
      title: video.title,
      status: 'processed',
      clip_count: result.bundles.length,
      skipped_clips: result.skipped.length,
      approval_failures: result.submissionFailures.length,
    };
  }

  private async notify(creator: Creator, video: ChannelVideo, result: BundleRunResult): Promise<void> {
    const { notifier } = this.deps;
    if (!notifier || result.bundles.length === 0) return;
    try {
      await notifier.sendText(notificationText(creator, video, result));
    } catch (err) {
      logger.warn('Notification failed', { creator: creator.name, error: errorMessage(err) });
    }
  }
}
