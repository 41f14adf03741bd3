import { randomBytes } from 'node:crypto';

/**
 * Generate a URL-safe random ID of the given byte length (default 16 bytes -> 22 chars base64url).
 */
export function generateId(bytes = 16): string {
  return randomBytes(bytes).toString('base64url');
}

/**
 * Clip ids combine the source video, the clip ordinal and its selection score,
 * e.g. `abc123_clip_02_0.87`. Characters outside [A-Za-z0-9_-] are replaced so
 * the id is safe as a file stem.
 */
export function clipId(sourceId: string, ordinal: number, score: number): string {
  const stem = sourceId.replace(/[^A-Za-z0-9_-]+/g, '-').replace(/^-+|-+$/g, '') || 'video';
  return `${stem}_clip_${String(ordinal).padStart(2, '0')}_${score.toFixed(2)}`;
}

const YOUTUBE_ID = /(?:youtube\.com\/watch\?v=|youtube\.com\/shorts\/|youtu\.be\/)([a-zA-Z0-9_-]{11})/;

/** The 11-character video id of a watch, shorts or youtu.be URL. */
export function extractYoutubeId(url: string): string | null {
  return YOUTUBE_ID.exec(url)?.[1] ?? null;
}

/**
 * Best-effort id for a video URL: the YouTube id when there is one, otherwise
 * the last path segment, otherwise `video`.
 */
export function videoIdFromUrl(url: string): string {
  const youtube = extractYoutubeId(url);
  if (youtube) return youtube;
  let segment = '';
  try {
    segment = new URL(url).pathname.split('/').filter(Boolean).pop() ?? '';
  } catch {
    segment = '';
  }
  const stem = segment.replace(/\.[A-Za-z0-9]+$/, '').replace(/[^A-Za-z0-9_-]+/g, '-');
  return stem || 'video';
}
