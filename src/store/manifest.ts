import { existsSync, readdirSync } from 'node:fs';
import { ManifestSchema } from '../shared/schemas.js';
import { NotFoundError } from '../shared/errors.js';
import { getDayPaths, isDay } from '../workspace/paths.js';
import { readJsonFile, writeJsonAtomic } from '../workspace/json-file.js';
import type { BundleSummary, Manifest } from '../workspace/types.js';

/**
 * One append-only manifest per calendar day at output/<date>/manifest.json.
 */
export class ManifestWriter {
  constructor(
    private readonly outputDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  pathFor(date: string): string {
    return getDayPaths(this.outputDir, date).manifest;
  }

  append(date: string, summary: BundleSummary): Manifest {
    const filePath = this.pathFor(date);
    const existing = readJsonFile(filePath, ManifestSchema, null);
    const clips = [...(existing?.clips ?? []), summary];
    const manifest: Manifest = {
      date,
      timestamp: this.now().toISOString(),
      total_count: clips.length,
      clips,
    };
    writeJsonAtomic(filePath, manifest);
    return manifest;
  }

  read(date: string): Manifest {
    const manifest = readJsonFile(this.pathFor(date), ManifestSchema, null);
    if (!manifest) throw new NotFoundError('manifest', date);
    return manifest;
  }

  /** Dates that have a manifest, oldest first. */
  dates(): string[] {
    if (!existsSync(this.outputDir)) return [];
    return readdirSync(this.outputDir)
      .filter((name) => isDay(name) && existsSync(this.pathFor(name)))
      .sort();
  }
}
