/**
 * Error taxonomy. Every class carries a stable `code` so CLI and HTTP layers
 * can map failures without matching on messages.
 */
export type ErrorCode =
  | 'DUPLICATE_CREATOR'
  | 'NOT_FOUND'
  | 'ALREADY_PROCESSED'
  | 'INVALID_TRANSITION'
  | 'TRANSCODE_FAILED'
  | 'CAPTION_SERVICE_FAILED'
  | 'GATEWAY_FAILED'
  | 'POST_FAILED'
  | 'CHANNEL_LISTING_FAILED'
  | 'DOWNLOAD_FAILED'
  | 'CLIPPING_API_FAILED'
  | 'STORE_WRITE_FAILED'
  | 'CONFIG_INVALID'
  | 'SOURCE_NOT_APPROVED';

export class ReelRunnerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReelRunnerError';
    this.code = code;
  }
}

export class DuplicateCreatorError extends ReelRunnerError {
  readonly creatorName: string;

  constructor(creatorName: string) {
    super('DUPLICATE_CREATOR', `Creator already exists: ${creatorName}`);
    this.name = 'DuplicateCreatorError';
    this.creatorName = creatorName;
  }
}

export type NotFoundKind = 'creator' | 'video' | 'clip' | 'manifest' | 'payment' | 'campaign';

export class NotFoundError extends ReelRunnerError {
  readonly kind: NotFoundKind;
  readonly id: string;

  constructor(kind: NotFoundKind, id: string) {
    super('NOT_FOUND', `${kind[0]?.toUpperCase()}${kind.slice(1)} not found: ${id}`);
    this.name = 'NotFoundError';
    this.kind = kind;
    this.id = id;
  }
}

export class AlreadyProcessedError extends ReelRunnerError {
  readonly videoId: string;

  constructor(videoId: string) {
    super('ALREADY_PROCESSED', `Video already processed: ${videoId}`);
    this.name = 'AlreadyProcessedError';
    this.videoId = videoId;
  }
}

export class InvalidTransitionError extends ReelRunnerError {
  readonly clipId: string;
  readonly from: string;
  readonly to: string;

  constructor(clipId: string, from: string, to: string) {
    super('INVALID_TRANSITION', `Clip ${clipId} is already ${from}; cannot move to ${to}`);
    this.name = 'InvalidTransitionError';
    this.clipId = clipId;
    this.from = from;
    this.to = to;
  }
}

export class TranscodeError extends ReelRunnerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSCODE_FAILED', message, options);
    this.name = 'TranscodeError';
  }
}

export class CaptionServiceError extends ReelRunnerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CAPTION_SERVICE_FAILED', message, options);
    this.name = 'CaptionServiceError';
  }
}

export class GatewayError extends ReelRunnerError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super('GATEWAY_FAILED', message, options);
    this.name = 'GatewayError';
    this.status = status;
  }
}

export class PostError extends ReelRunnerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('POST_FAILED', message, options);
    this.name = 'PostError';
  }
}

export class ChannelListingError extends ReelRunnerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CHANNEL_LISTING_FAILED', message, options);
    this.name = 'ChannelListingError';
  }
}

export class DownloadError extends ReelRunnerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DOWNLOAD_FAILED', message, options);
    this.name = 'DownloadError';
  }
}

export class ClippingApiError extends ReelRunnerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CLIPPING_API_FAILED', message, options);
    this.name = 'ClippingApiError';
  }
}

export class StoreWriteError extends ReelRunnerError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('STORE_WRITE_FAILED', `Failed to write ${path}${reason}`, options);
    this.name = 'StoreWriteError';
    this.path = path;
  }
}

export class ConfigError extends ReelRunnerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_INVALID', message, options);
    this.name = 'ConfigError';
  }
}

export class UnapprovedSourceError extends ReelRunnerError {
  readonly url: string;
  readonly campaignId: string;

  constructor(url: string, campaignId: string) {
    super('SOURCE_NOT_APPROVED', `URL is not an approved source for campaign '${campaignId}': ${url}`);
    this.name = 'UnapprovedSourceError';
    this.url = url;
    this.campaignId = campaignId;
  }
}
