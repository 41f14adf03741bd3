import type { CaptionCandidate, ClipMetadata } from '../workspace/types.js';

/**
 * Contracts for the external collaborators. Defaults live next to this file
 * (yt-dlp and ffmpeg subprocesses, HTTP APIs via fetch); tests swap in fakes.
 */

export interface ChannelVideo {
  video_id: string;
  platform: string;
  title: string;
  url: string;
  published_at: string | null;
}

export interface ChannelLister {
  listRecent(channelUrl: string, limit: number): Promise<ChannelVideo[]>;
}

export interface DownloadedVideo {
  video_id: string;
  title: string;
  description: string;
  duration_seconds: number | null;
  path: string;
}

export interface VideoDownloader {
  download(url: string, destDir: string): Promise<DownloadedVideo>;
}

export interface DurationReader {
  readDuration(videoPath: string): Promise<number>;
}

export interface MotionScorer {
  /** One normalized score in [0, 1] per consecutive window of `windowSeconds`. */
  scoreWindows(videoPath: string, windowSeconds: number): Promise<number[]>;
}

export interface Interval {
  start: number;
  end: number;
  score: number;
}

export interface ClippingApiRequest {
  targetSeconds: number;
  minSeconds: number;
  maxSeconds: number;
}

export interface ClippingApi {
  detect(videoPath: string, req: ClippingApiRequest): Promise<Interval[]>;
}

export interface TranscodeRequest {
  sourcePath: string;
  outputPath: string;
  start: number;
  end: number;
  width: number;
  height: number;
  bitrate: string;
  codec: string;
}

export interface Transcoder {
  /** Resolves to the written artifact path; rejects with TranscodeError. */
  transcode(req: TranscodeRequest): Promise<string>;
}

export interface CaptionRequest {
  description: string;
  topic: string;
  context: string;
  count: number;
}

export interface CaptionService {
  /** Rejects with CaptionServiceError. */
  generate(req: CaptionRequest): Promise<CaptionCandidate[]>;
}

export interface ApprovalMessage {
  clipId: string;
  videoPath: string;
  caption: string;
  metadata: ClipMetadata;
}

export interface MessagingGateway {
  /** Resolves to the gateway's opaque response; rejects with GatewayError. */
  sendApprovalRequest(msg: ApprovalMessage): Promise<unknown>;
  sendText(message: string): Promise<unknown>;
  checkHealth(): Promise<boolean>;
}

export interface PublishRequest {
  videoPath: string;
  caption: string;
  destination: string;
}

export interface Publisher {
  /** Resolves to the platform post id; rejects with PostError. */
  publish(req: PublishRequest): Promise<string>;
}

export type FetchLike = (url: string | URL, init?: RequestInit) => Promise<Response>;
