import { describe, it, expect } from '@jest/globals';
import {
  FALLBACK_SCORE,
  SegmentSelector,
  fallbackInterval,
  rankSegments,
  selectSegments,
  type SelectionOptions,
} from '../pipeline/segments.js';
import { ClippingApiError } from '../shared/errors.js';
import type { ClippingApi, ClippingApiRequest, Interval } from '../connector/types.js';
import { FakeScorer } from './fakes.js';

const OPTS: SelectionOptions = { clipLength: 10, windowSeconds: 5, threshold: 0.15, minSpacing: 0 };
// Twelve 5s windows: a burst at 10-20s and a smaller one at 30-40s.
const SCORES = [0, 0, 1, 1, 0, 0, 0.2, 0.2, 0, 0, 0, 0];

class StubClippingApi implements ClippingApi {
  readonly requests: ClippingApiRequest[] = [];
  constructor(private readonly result: Interval[] | Error) {}

  async detect(_videoPath: string, req: ClippingApiRequest): Promise<Interval[]> {
    this.requests.push(req);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

describe('rankSegments', () => {
  it('picks the highest-scoring non-overlapping windows', () => {
    expect(rankSegments(60, 2, SCORES, OPTS)).toEqual([
      { start: 10, end: 20, score: 1 },
      { start: 30, end: 40, score: 0.2 },
    ]);
  });

  it('enforces the minimum spacing between starts', () => {
    expect(rankSegments(60, 3, SCORES, { ...OPTS, minSpacing: 30 })).toEqual([{ start: 10, end: 20, score: 1 }]);
  });

  it('returns at most the requested count', () => {
    expect(rankSegments(60, 1, SCORES, OPTS)).toEqual([{ start: 10, end: 20, score: 1 }]);
  });

  it('drops candidates below the threshold', () => {
    expect(rankSegments(60, 3, SCORES, { ...OPTS, threshold: 0.6 })).toEqual([{ start: 10, end: 20, score: 1 }]);
  });

  it('breaks score ties by earlier start', () => {
    const flatBursts = [1, 1, 0, 0, 1, 1, 0, 0];
    expect(rankSegments(40, 2, flatBursts, OPTS)).toEqual([
      { start: 0, end: 10, score: 1 },
      { start: 20, end: 30, score: 1 },
    ]);
  });

  it('never places a clip past the end of the video', () => {
    const rising = [0, 0, 0, 0, 0.5, 1];
    expect(rankSegments(30, 1, rising, OPTS)).toEqual([{ start: 20, end: 30, score: 0.75 }]);
  });

  it('returns nothing when the video is shorter than a clip', () => {
    expect(rankSegments(8, 2, [1, 1], OPTS)).toEqual([]);
  });
});

describe('selectSegments', () => {
  it('falls back to the opening of the video when nothing is viable', () => {
    expect(selectSegments(60, 2, new Array<number>(12).fill(0), OPTS)).toEqual([
      { start: 0, end: 10, score: FALLBACK_SCORE },
    ]);
  });

  it('clamps the fallback to short videos', () => {
    expect(selectSegments(4.25, 3, [], OPTS)).toEqual([{ start: 0, end: 4.25, score: 0.5 }]);
    expect(fallbackInterval(7.12345, 10)).toEqual({ start: 0, end: 7.123, score: 0.5 });
  });

  it('returns nothing for a zero count', () => {
    expect(selectSegments(60, 0, SCORES, OPTS)).toEqual([]);
  });
});

describe('SegmentSelector', () => {
  it('uses motion scores when no clipping API is configured', async () => {
    const scorer = new FakeScorer(SCORES);
    const selector = new SegmentSelector({ scorer, options: OPTS });
    const result = await selector.select('/w/v.mp4', 60, 1);
    expect(result).toEqual({ intervals: [{ start: 10, end: 20, score: 1 }], source: 'motion' });
  });

  it('prefers clipping API segments, capped at the count', async () => {
    const api = new StubClippingApi([
      { start: 3, end: 25, score: 0.9 },
      { start: 40, end: 58, score: 0.7 },
      { start: 70, end: 90, score: 0.6 },
    ]);
    const scorer = new FakeScorer(SCORES);
    const selector = new SegmentSelector({
      scorer,
      clippingApi: api,
      options: OPTS,
      apiBounds: { minSeconds: 15, maxSeconds: 60 },
    });
    const result = await selector.select('/w/v.mp4', 120, 2);
    expect(result.source).toBe('clipping_api');
    expect(result.intervals).toEqual([
      { start: 3, end: 25, score: 0.9 },
      { start: 40, end: 58, score: 0.7 },
    ]);
    expect(api.requests).toEqual([{ targetSeconds: 10, minSeconds: 15, maxSeconds: 60 }]);
    expect(scorer.calls).toBe(0);
  });

  it('falls back to motion scores when the clipping API fails', async () => {
    const api = new StubClippingApi(new ClippingApiError('Clipping API error 500: boom'));
    const selector = new SegmentSelector({ scorer: new FakeScorer(SCORES), clippingApi: api, options: OPTS });
    const result = await selector.select('/w/v.mp4', 60, 1);
    expect(result.source).toBe('motion');
  });

  it('uses the fallback interval when scoring yields nothing', async () => {
    const selector = new SegmentSelector({ scorer: new FakeScorer([]), options: OPTS });
    expect(await selector.select('/w/v.mp4', 45, 3)).toEqual({
      intervals: [{ start: 0, end: 10, score: 0.5 }],
      source: 'fallback',
    });
  });
});
