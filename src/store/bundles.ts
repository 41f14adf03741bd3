import { existsSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { ClipBundleSchema } from '../shared/schemas.js';
import { NotFoundError } from '../shared/errors.js';
import { getDayPaths, isDay } from '../workspace/paths.js';
import { readJsonFile, writeJsonAtomic } from '../workspace/json-file.js';
import type { ApprovalStatus, ClipBundle } from '../workspace/types.js';

export interface BundleFilter {
  status?: ApprovalStatus;
  date?: string;
}

/**
 * Bundle metadata records, one JSON file per clip under
 * output/<date>/metadata/<clip_id>.json. This is where approval and posting
 * state lives; manifests only carry creation-time summaries.
 */
export class BundleStore {
  constructor(private readonly outputDir: string) {}

  metadataPath(date: string, clipId: string): string {
    return join(getDayPaths(this.outputDir, date).metadataDir, `${clipId}.json`);
  }

  save(bundle: ClipBundle): string {
    const filePath = this.metadataPath(bundle.date, bundle.clip_id);
    writeJsonAtomic(filePath, bundle);
    return filePath;
  }

  find(clipId: string): ClipBundle | null {
    for (const date of this.dates().reverse()) {
      const filePath = this.metadataPath(date, clipId);
      if (existsSync(filePath)) {
        return readJsonFile(filePath, ClipBundleSchema, null);
      }
    }
    return null;
  }

  get(clipId: string): ClipBundle {
    const bundle = this.find(clipId);
    if (!bundle) throw new NotFoundError('clip', clipId);
    return bundle;
  }

  list(filter: BundleFilter = {}): ClipBundle[] {
    const dates = filter.date ? [filter.date] : this.dates();
    const out: ClipBundle[] = [];
    for (const date of dates) {
      const dir = getDayPaths(this.outputDir, date).metadataDir;
      if (!existsSync(dir)) continue;
      const files = readdirSync(dir).filter((f) => f.endsWith('.json')).sort();
      for (const file of files) {
        const bundle = readJsonFile(join(dir, file), ClipBundleSchema, null);
        if (!bundle) continue;
        if (filter.status && bundle.approval_status !== filter.status) continue;
        out.push(bundle);
      }
    }
    return out.sort((a, b) => a.metadata.created_at.localeCompare(b.metadata.created_at));
  }

  private dates(): string[] {
    if (!existsSync(this.outputDir)) return [];
    return readdirSync(this.outputDir).filter(isDay).sort();
  }
}
