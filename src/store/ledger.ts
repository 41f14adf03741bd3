import { LedgerFileSchema } from '../shared/schemas.js';
import { AlreadyProcessedError } from '../shared/errors.js';
import { readJsonFile, writeJsonAtomic } from '../workspace/json-file.js';
import type { ProcessedVideoRecord } from '../workspace/types.js';

export const DEFAULT_PLATFORM = 'youtube';

function ledgerKey(platform: string, videoId: string): string {
  return `${platform}:${videoId}`;
}

/**
 * Persisted set of videos already turned into clips. Keys are scoped by
 * platform so ids from different platforms never collide.
 */
export class ProcessedVideoLedger {
  private records: ProcessedVideoRecord[];
  private readonly keys = new Set<string>();

  constructor(
    private readonly filePath: string,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.records = readJsonFile(filePath, LedgerFileSchema, []);
    for (const r of this.records) this.keys.add(ledgerKey(r.platform, r.video_id));
  }

  get size(): number {
    return this.records.length;
  }

  has(videoId: string, platform: string = DEFAULT_PLATFORM): boolean {
    return this.keys.has(ledgerKey(platform, videoId));
  }

  markProcessed(
    videoId: string,
    creatorName: string,
    clipCount: number,
    platform: string = DEFAULT_PLATFORM,
  ): ProcessedVideoRecord {
    if (this.has(videoId, platform)) {
      throw new AlreadyProcessedError(videoId);
    }
    const record: ProcessedVideoRecord = {
      platform,
      video_id: videoId,
      creator_name: creatorName,
      timestamp: this.now().toISOString(),
      clip_count: clipCount,
    };
    const next = [...this.records, record];
    writeJsonAtomic(this.filePath, next);
    this.records = next;
    this.keys.add(ledgerKey(platform, videoId));
    return { ...record };
  }

  list(filter?: { creatorName?: string }): ProcessedVideoRecord[] {
    return this.records
      .filter((r) => !filter?.creatorName || r.creator_name === filter.creatorName)
      .map((r) => ({ ...r }));
  }
}
