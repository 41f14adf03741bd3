import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { TranscodeError } from '../../shared/errors.js';
import { errorMessage, logger } from '../../shared/logger.js';
import { execTool, type ExecFn } from '../exec.js';
import type { DurationReader, MotionScorer, TranscodeRequest, Transcoder } from '../types.js';

export interface FfmpegOptions {
  ffmpegBin?: string;
  ffprobeBin?: string;
  /** Frames per second sampled when scoring motion. */
  sampleFps?: number;
  timeouts?: Partial<FfmpegTimeouts>;
  exec?: ExecFn;
}

/** Subprocess limits in milliseconds; a process still running is killed. */
export interface FfmpegTimeouts {
  transcodeMs: number;
  scoreMs: number;
  durationMs: number;
}

export const DEFAULT_FFMPEG_TIMEOUTS: FfmpegTimeouts = {
  transcodeMs: 10 * 60_000,
  scoreMs: 30 * 60_000,
  durationMs: 60_000,
};

export interface SceneSample {
  time: number;
  score: number;
}

function seconds(value: number): string {
  return value.toFixed(3);
}

/**
 * Center-crop to the target aspect ratio, then scale to the exact output size.
 * Quotes keep the commas inside min() from splitting the filter chain.
 */
export function cropScaleFilter(width: number, height: number): string {
  return (
    `crop='min(iw,ih*${width}/${height})':'min(ih,iw*${height}/${width})',` +
    `scale=${width}:${height},setsar=1`
  );
}

export function buildTranscodeArgs(req: TranscodeRequest): string[] {
  return [
    '-hide_banner',
    '-loglevel',
    'error',
    '-y',
    '-ss',
    seconds(req.start),
    '-i',
    req.sourcePath,
    '-t',
    seconds(req.end - req.start),
    '-vf',
    cropScaleFilter(req.width, req.height),
    '-c:v',
    req.codec,
    '-b:v',
    req.bitrate,
    '-preset',
    'medium',
    '-c:a',
    'aac',
    '-b:a',
    '128k',
    '-movflags',
    '+faststart',
    req.outputPath,
  ];
}

export function buildSceneScoreArgs(videoPath: string, sampleFps: number): string[] {
  return [
    '-hide_banner',
    '-nostats',
    '-i',
    videoPath,
    '-an',
    '-vf',
    `fps=${sampleFps},scale=320:-2,select='gte(scene,0)',metadata=print:file=-`,
    '-f',
    'null',
    '-',
  ];
}

/** Reads `pts_time:` / `lavfi.scene_score=` pairs from the metadata filter output. */
export function parseSceneScores(output: string): SceneSample[] {
  const samples: SceneSample[] = [];
  let time: number | null = null;
  for (const line of output.split(/\r?\n/)) {
    const pts = line.match(/pts_time:(\S+)/);
    if (pts?.[1] !== undefined) {
      const t = Number(pts[1]);
      time = Number.isFinite(t) ? t : null;
      continue;
    }
    const score = line.match(/lavfi\.scene_score=(\S+)/);
    if (score?.[1] !== undefined && time !== null) {
      const s = Number(score[1]);
      if (Number.isFinite(s)) samples.push({ time, score: s });
      time = null;
    }
  }
  return samples;
}

/**
 * Average samples into consecutive windows and min-max normalize to [0, 1].
 * A flat signal normalizes to all zeros.
 */
export function windowScores(samples: readonly SceneSample[], windowSeconds: number): number[] {
  if (samples.length === 0 || windowSeconds <= 0) return [];
  const sums: number[] = [];
  const counts: number[] = [];
  for (const { time, score } of samples) {
    const i = Math.max(0, Math.floor(time / windowSeconds));
    while (sums.length <= i) {
      sums.push(0);
      counts.push(0);
    }
    sums[i] = (sums[i] ?? 0) + score;
    counts[i] = (counts[i] ?? 0) + 1;
  }
  const means = sums.map((sum, i) => {
    const n = counts[i] ?? 0;
    return n > 0 ? sum / n : 0;
  });

  const min = Math.min(...means);
  const max = Math.max(...means);
  if (max <= min) return means.map(() => 0);
  return means.map((m) => (m - min) / (max - min));
}

export class FfmpegToolkit implements Transcoder, MotionScorer, DurationReader {
  private readonly ffmpegBin: string;
  private readonly ffprobeBin: string;
  private readonly sampleFps: number;
  private readonly timeouts: FfmpegTimeouts;
  private readonly exec: ExecFn;

  constructor(opts: FfmpegOptions = {}) {
    this.ffmpegBin = opts.ffmpegBin ?? 'ffmpeg';
    this.ffprobeBin = opts.ffprobeBin ?? 'ffprobe';
    this.sampleFps = opts.sampleFps ?? 2;
    this.timeouts = { ...DEFAULT_FFMPEG_TIMEOUTS, ...opts.timeouts };
    this.exec = opts.exec ?? execTool;
  }

  async transcode(req: TranscodeRequest): Promise<string> {
    if (!(req.end > req.start)) {
      throw new TranscodeError(`Empty interval [${req.start}, ${req.end}) for ${req.outputPath}`);
    }
    mkdirSync(dirname(req.outputPath), { recursive: true });
    try {
      await this.exec(this.ffmpegBin, buildTranscodeArgs(req), { timeoutMs: this.timeouts.transcodeMs });
    } catch (err) {
      throw new TranscodeError(`Transcode failed for ${req.outputPath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    logger.debug('Clip written', { path: req.outputPath });
    return req.outputPath;
  }

  async scoreWindows(videoPath: string, windowSeconds: number): Promise<number[]> {
    const { stdout } = await this.exec(this.ffmpegBin, buildSceneScoreArgs(videoPath, this.sampleFps), {
      timeoutMs: this.timeouts.scoreMs,
    });
    return windowScores(parseSceneScores(stdout), windowSeconds);
  }

  async readDuration(videoPath: string): Promise<number> {
    const { stdout } = await this.exec(
      this.ffprobeBin,
      ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', videoPath],
      { timeoutMs: this.timeouts.durationMs },
    );
    const duration = Number.parseFloat(stdout.trim());
    if (!Number.isFinite(duration)) {
      throw new Error(`ffprobe reported no duration for ${videoPath}`);
    }
    return duration;
  }
}
