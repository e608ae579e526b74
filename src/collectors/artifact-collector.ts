import * as fs from 'fs';
import * as path from 'path';
import type { TraceArtifact } from '../types';
import { slugToDisplayName } from '../utils';
import { parseTraceFilename, TRACE_EXTENSION } from '../naming';

/**
 * Newest first; archives without a parseable timestamp go last.
 * Array#sort is stable, so ties keep their encounter order.
 */
export function compareArtifacts(a: TraceArtifact, b: TraceArtifact): number {
  if (a.createdAtMillis === undefined && b.createdAtMillis === undefined) return 0;
  if (a.createdAtMillis === undefined) return 1;
  if (b.createdAtMillis === undefined) return -1;
  return b.createdAtMillis - a.createdAtMillis;
}

/**
 * Collects trace archives from a directory tree and rebuilds their
 * metadata from the filenames
 */
export class ArtifactCollector {
  /**
   * Walk `dir` recursively and return every `.zip` archive, sorted.
   * A missing directory, unreadable entries and non-regular files are
   * skipped rather than reported.
   */
  collect(dir: string): TraceArtifact[] {
    const artifacts: TraceArtifact[] = [];
    this.walk(path.resolve(dir), artifacts);
    return artifacts.sort(compareArtifacts);
  }

  /**
   * Build the record for one archive from its name and size
   */
  toArtifact(filePath: string, sizeBytes: number): TraceArtifact {
    const filename = path.basename(filePath);
    const parsed = parseTraceFilename(filename);

    return {
      testSlug: parsed.slug,
      displayName: parsed.recognized ? slugToDisplayName(parsed.slug) : parsed.slug,
      status: parsed.status,
      createdAtMillis: parsed.createdAtMillis,
      sizeBytes,
      filename,
      filePath,
    };
  }

  private walk(dir: string, artifacts: TraceArtifact[]): void {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch {
      return;
    }

    // Name order keeps the encounter order stable across platforms
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        this.walk(fullPath, artifacts);
        continue;
      }

      if (!entry.isFile() || !entry.name.endsWith(TRACE_EXTENSION)) continue;

      let stat: fs.Stats;
      try {
        stat = fs.statSync(fullPath);
      } catch {
        continue;
      }
      artifacts.push(this.toArtifact(fullPath, stat.size));
    }
  }
}

/**
 * Scan `dir` for trace archives, newest first
 */
export function collectArtifacts(dir: string): TraceArtifact[] {
  return new ArtifactCollector().collect(dir);
}
