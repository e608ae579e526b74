/**
 * Filename grammar shared by the namer and the collector.
 *
 * Archives carry their metadata in the name:
 *   <slug>-PASS-<epoch-ms>.zip
 *   <slug>-FAIL-<epoch-ms>.zip
 *   <slug>-<epoch-ms>.zip          (legacy, written before status tagging)
 * The epoch is always 13 digits.
 */

import type { TagStatus, TraceFilenameParts, TraceStatus } from '../types';

const TAGGED_PATTERN = /^(.*?)-(PASS|FAIL)-(\d{13})\.zip$/;
const UNTAGGED_PATTERN = /^(.*)-(\d{13})\.zip$/;

export const TRACE_EXTENSION = '.zip';

export type TraceFilenameMatch =
  | { format: 'tagged'; slug: string; status: TagStatus; epoch: string }
  | { format: 'legacy'; slug: string; epoch: string };

/**
 * Match a basename against the grammar, tagged form first.
 * Returns undefined when neither form applies.
 */
export function matchTraceFilename(filename: string): TraceFilenameMatch | undefined {
  const tagged = TAGGED_PATTERN.exec(filename);
  if (tagged) {
    return {
      format: 'tagged',
      slug: tagged[1],
      status: tagged[2] === 'PASS' ? 'pass' : 'fail',
      epoch: tagged[3],
    };
  }

  const untagged = UNTAGGED_PATTERN.exec(filename);
  if (untagged) {
    return { format: 'legacy', slug: untagged[1], epoch: untagged[2] };
  }

  return undefined;
}

/**
 * Parse a basename into its metadata. Names outside the grammar keep the
 * whole name (minus `.zip`) as the slug, with no timestamp.
 */
export function parseTraceFilename(filename: string): TraceFilenameParts & { recognized: boolean } {
  const match = matchTraceFilename(filename);
  if (!match) {
    const slug = filename.endsWith(TRACE_EXTENSION)
      ? filename.slice(0, -TRACE_EXTENSION.length)
      : filename;
    return { slug, status: 'unknown', recognized: false };
  }

  const status: TraceStatus = match.format === 'tagged' ? match.status : 'unknown';
  return {
    slug: match.slug,
    status,
    createdAtMillis: Number(match.epoch),
    recognized: true,
  };
}

export function formatTraceFilename(slug: string, status: TagStatus | undefined, epoch: number | string): string {
  const tag = status ? `-${status.toUpperCase()}` : '';
  return `${slug}${tag}-${epoch}${TRACE_EXTENSION}`;
}
