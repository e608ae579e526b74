import * as fs from 'fs';
import * as path from 'path';
import type { TagStatus } from '../types';
import { deriveSlug } from '../utils';
import { formatTraceFilename, matchTraceFilename } from './trace-filename';

/**
 * Compose `<outputDir>/<slug>-<nowMillis>.zip` for a test about to be traced.
 * The caller samples the clock so this stays deterministic.
 */
export function buildTracePath(testName: string, outputDir: string, nowMillis: number): string {
  return path.join(outputDir, formatTraceFilename(deriveSlug(testName), undefined, nowMillis));
}

/**
 * Rename an archive so its name carries the test outcome.
 *
 * - `<slug>-<epoch>.zip` becomes `<slug>-<STATUS>-<epoch>.zip`
 * - an already tagged name has its status segment replaced, never a second
 *   one appended; same status is a no-op
 * - any other name is returned as given
 *
 * An existing file at the destination is replaced. Rename failures are
 * logged and the original path comes back, so callers must read the
 * status from whatever name is on disk afterwards.
 */
export function tagWithStatus(tracePath: string, status: TagStatus): string {
  const filename = path.basename(tracePath);
  const match = matchTraceFilename(filename);
  if (!match) return tracePath;
  if (match.format === 'tagged' && match.status === status) return tracePath;

  const target = path.join(path.dirname(tracePath), formatTraceFilename(match.slug, status, match.epoch));

  try {
    fs.renameSync(tracePath, target);
    return target;
  } catch (err) {
    console.warn(`⚠️  Could not rename trace file ${tracePath}:`, err instanceof Error ? err.message : err);
    return tracePath;
  }
}

export { deriveSlug };
