import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { z } from 'zod';
import { StoreWriteError, ConfigError } from '../shared/errors.js';
import { errorMessage } from '../shared/logger.js';

/**
 * Read and validate a JSON store file. A missing file yields `fallback`;
 * a file that exists but does not parse or validate is an error, since
 * silently resetting a store would drop the idempotency records it holds.
 */
export function readJsonFile<S extends z.ZodTypeAny, F = z.infer<S>>(
  filePath: string,
  schema: S,
  fallback: F,
): z.infer<S> | F {
  if (!existsSync(filePath)) return fallback;
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Could not parse ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid data in ${filePath}: ${result.error.issues[0]?.message ?? 'schema mismatch'}`);
  }
  return result.data;
}

/**
 * Replace a JSON file as a whole: write a sibling temp file, then rename it
 * over the target so readers never observe a partial write.
 */
export function writeJsonAtomic(filePath: string, value: unknown): void {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(tmpPath, JSON.stringify(value, null, 2) + '\n', 'utf8');
    renameSync(tmpPath, filePath);
  } catch (err) {
    rmSync(tmpPath, { force: true });
    throw new StoreWriteError(filePath, { cause: err });
  }
}
