import { mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { generateId } from '../shared/ids.js';
import { DownloadError, TranscodeError } from '../shared/errors.js';
import { errorMessage, logger } from '../shared/logger.js';
import type { DurationReader, VideoDownloader } from '../connector/types.js';
import type { BundleRunResult, CampaignContext, ClipBundler } from './bundler.js';
import type { SegmentSelector } from './segments.js';

export interface VideoJob {
  video_id: string;
  url: string;
  title: string;
  creatorName: string | null;
  clipCount: number;
  campaign?: CampaignContext | null;
}

export interface VideoPipeline {
  processVideo(job: VideoJob): Promise<BundleRunResult>;
}

export interface VideoProcessorDeps {
  downloader: VideoDownloader;
  durationReader: DurationReader;
  selector: SegmentSelector;
  bundler: ClipBundler;
  workDir: string;
}

/**
 * download → select → bundle → cleanup for a single source video. The
 * downloaded source lives in a scratch directory that is always removed.
 */
export class VideoProcessor implements VideoPipeline {
  constructor(private readonly deps: VideoProcessorDeps) {}

  async processVideo(job: VideoJob): Promise<BundleRunResult> {
    const scratch = join(this.deps.workDir, `${job.video_id.replace(/[^A-Za-z0-9_-]/g, '_')}-${generateId(4)}`);
    mkdirSync(scratch, { recursive: true });
    try {
      const source = await this.deps.downloader.download(job.url, scratch);
      const duration = source.duration_seconds ?? (await this.readDuration(source.path));

      const selection = await this.deps.selector.select(source.path, duration, job.clipCount);
      logger.info('Segments selected', {
        video_id: job.video_id,
        source: selection.source,
        count: selection.intervals.length,
      });

      const result = await this.deps.bundler.bundle(
        {
          id: source.video_id || job.video_id,
          url: job.url,
          title: source.title || job.title,
          description: source.description,
          path: source.path,
          creatorName: job.creatorName,
          campaign: job.campaign ?? null,
        },
        selection.intervals,
      );
      if (result.bundles.length === 0) {
        throw new TranscodeError(
          `No clips produced for ${job.video_id} (${result.skipped.length} interval(s) failed)`,
        );
      }
      return result;
    } finally {
      rmSync(scratch, { recursive: true, force: true });
    }
  }

  private async readDuration(path: string): Promise<number> {
    try {
      return await this.deps.durationReader.readDuration(path);
    } catch (err) {
      throw new DownloadError(`Could not determine duration of ${path}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
