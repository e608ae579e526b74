// ============================================================================
// Trace Archives
// ============================================================================

/** Outcome a status tag can carry in an archive filename */
export type TagStatus = 'pass' | 'fail';

/** `unknown` covers legacy archives written before status tagging */
export type TraceStatus = TagStatus | 'unknown';

/**
 * Fields encoded positionally in an archive filename:
 * `<slug>-<STATUS>-<epoch-ms>.zip` or legacy `<slug>-<epoch-ms>.zip`
 */
export interface TraceFilenameParts {
  slug: string;
  status: TraceStatus;
  createdAtMillis?: number;
}

/**
 * One archive found during a scan. Rebuilt from the filename every time;
 * nothing about an archive is stored anywhere else.
 */
export interface TraceArtifact {
  testSlug: string;
  displayName: string;
  status: TraceStatus;
  createdAtMillis?: number;
  sizeBytes: number;
  filename: string;
  filePath: string;
}

// ============================================================================
// Report
// ============================================================================

export interface ReportSummary {
  total: number;
  passed: number;
  failed: number;
  unknown: number;
}

export interface ReportModel {
  artifacts: TraceArtifact[];
  summary: ReportSummary;
}

export interface ReportOptions {
  tracesDir?: string;
  outputDir?: string;
  projectName?: string;
  // Default: true. Copies the offline Trace Viewer into <outputDir>/trace/
  copyViewerAssets?: boolean;
}

export interface ResolvedReportConfig {
  tracesDir: string;
  outputDir: string;
  projectName: string;
  copyViewerAssets: boolean;
}

// ============================================================================
// Preview Server
// ============================================================================

export interface ServerOptions {
  port?: number;
  dir?: string;
}

export interface ResolvedServerConfig {
  port: number;
  dir: string;
}
