import { errorMessage, logger } from '../shared/logger.js';
import type { ClippingApi, Interval, MotionScorer } from '../connector/types.js';

/** Score given to the whole-video-start fallback clip. */
export const FALLBACK_SCORE = 0.5;

const EPSILON = 1e-9;

export interface SelectionOptions {
  clipLength: number;
  windowSeconds: number;
  threshold: number;
  minSpacing: number;
}

export type SelectionSource = 'clipping_api' | 'motion' | 'fallback';

export interface SegmentSelection {
  intervals: Interval[];
  source: SelectionSource;
}

function round3(n: number): number {
  return Math.round(n * 1000) / 1000;
}

export function fallbackInterval(duration: number, clipLength: number): Interval {
  return { start: 0, end: round3(Math.max(0, Math.min(clipLength, duration))), score: FALLBACK_SCORE };
}

/**
 * Every window start where a full clip fits is a candidate, scored by the mean
 * of the windows it covers. Viable candidates (score >= threshold) are ranked
 * by score, earlier start first on ties, and accepted greedily while starts
 * stay at least max(minSpacing, clipLength) apart. May return an empty list.
 */
export function rankSegments(
  duration: number,
  count: number,
  scores: readonly number[],
  opts: SelectionOptions,
): Interval[] {
  const { clipLength, windowSeconds, threshold } = opts;
  if (count <= 0 || clipLength <= 0 || windowSeconds <= 0 || duration < clipLength) return [];

  const candidates: Interval[] = [];
  for (let i = 0; i < scores.length; i++) {
    const start = round3(i * windowSeconds);
    const end = round3(start + clipLength);
    if (end > duration + EPSILON) break;
    const last = Math.min(scores.length, Math.ceil(end / windowSeconds - EPSILON));
    const covered = scores.slice(i, last);
    if (covered.length === 0) continue;
    const score = covered.reduce((sum, s) => sum + s, 0) / covered.length;
    if (score + EPSILON >= threshold) candidates.push({ start, end, score });
  }

  candidates.sort((a, b) => b.score - a.score || a.start - b.start);

  const spacing = Math.max(opts.minSpacing, clipLength);
  const accepted: Interval[] = [];
  for (const candidate of candidates) {
    if (accepted.length >= count) break;
    const clashes = accepted.some((a) => Math.abs(a.start - candidate.start) + EPSILON < spacing);
    if (!clashes) accepted.push(candidate);
  }
  return accepted;
}

/** rankSegments, or the single fallback interval when nothing is viable. */
export function selectSegments(
  duration: number,
  count: number,
  scores: readonly number[],
  opts: SelectionOptions,
): Interval[] {
  if (count <= 0) return [];
  const ranked = rankSegments(duration, count, scores, opts);
  return ranked.length > 0 ? ranked : [fallbackInterval(duration, opts.clipLength)];
}

export interface SegmentSelectorDeps {
  scorer: MotionScorer;
  clippingApi?: ClippingApi | null;
  options: SelectionOptions;
  /** Duration bounds passed to the clipping API. */
  apiBounds?: { minSeconds: number; maxSeconds: number };
}

export class SegmentSelector {
  constructor(private readonly deps: SegmentSelectorDeps) {}

  async select(videoPath: string, duration: number, count: number): Promise<SegmentSelection> {
    if (count <= 0) return { intervals: [], source: 'motion' };
    const { options } = this.deps;

    const api = this.deps.clippingApi;
    if (api) {
      try {
        const bounds = this.deps.apiBounds ?? { minSeconds: options.clipLength, maxSeconds: options.clipLength };
        const intervals = await api.detect(videoPath, { targetSeconds: options.clipLength, ...bounds });
        if (intervals.length > 0) {
          return { intervals: intervals.slice(0, count), source: 'clipping_api' };
        }
        logger.warn('Clipping API found no segments; using motion scores', { video: videoPath });
      } catch (err) {
        logger.warn('Clipping API failed; using motion scores', { video: videoPath, error: errorMessage(err) });
      }
    }

    let scores: number[] = [];
    try {
      scores = await this.deps.scorer.scoreWindows(videoPath, options.windowSeconds);
    } catch (err) {
      logger.warn('Motion scoring failed', { video: videoPath, error: errorMessage(err) });
    }

    const ranked = rankSegments(duration, count, scores, options);
    if (ranked.length > 0) return { intervals: ranked, source: 'motion' };
    logger.info('No viable segments; using the opening of the video', { video: videoPath, duration });
    return { intervals: [fallbackInterval(duration, options.clipLength)], source: 'fallback' };
  }
}
