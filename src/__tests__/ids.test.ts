import { describe, it, expect } from '@jest/globals';
import { clipId, extractYoutubeId, videoIdFromUrl } from '../shared/ids.js';

describe('extractYoutubeId', () => {
  it('reads watch, shorts and youtu.be URLs', () => {
    expect(extractYoutubeId('https://www.youtube.com/watch?v=abcdefghijk&t=30')).toBe('abcdefghijk');
    expect(extractYoutubeId('https://youtube.com/shorts/a-b_c1234567')).toBe('a-b_c123456');
    expect(extractYoutubeId('https://youtu.be/abcdefghijk?si=share')).toBe('abcdefghijk');
  });

  it('returns null for other hosts and short ids', () => {
    expect(extractYoutubeId('https://example.com/watch?v=abcdefghijk')).toBeNull();
    expect(extractYoutubeId('https://www.youtube.com/watch?v=short')).toBeNull();
  });
});

describe('videoIdFromUrl', () => {
  it('prefers the YouTube id', () => {
    expect(videoIdFromUrl('https://www.youtube.com/watch?v=abcdefghijk&list=PL1')).toBe('abcdefghijk');
    expect(videoIdFromUrl('https://youtu.be/abcdefghijk')).toBe('abcdefghijk');
  });

  it('falls back to the last path segment without its extension', () => {
    expect(videoIdFromUrl('https://cdn.example.com/media/launch_day.mp4')).toBe('launch_day');
    expect(videoIdFromUrl('https://twitch.tv/videos/123456')).toBe('123456');
  });

  it('uses a placeholder when nothing usable is left', () => {
    expect(videoIdFromUrl('https://example.com/')).toBe('video');
    expect(videoIdFromUrl('not a url')).toBe('video');
  });
});

describe('clipId', () => {
  it('makes a file-safe id from the source, ordinal and score', () => {
    expect(clipId('abc 123', 2, 0.8666)).toBe('abc-123_clip_02_0.87');
    expect(clipId('***', 1, 0.5)).toBe('video_clip_01_0.50');
  });
});
