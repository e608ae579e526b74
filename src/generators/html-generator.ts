/**
 * HTML Generator - Renders the trace dashboard as a single static document
 *
 * Pure: takes already-collected artifacts and returns a string. Every value
 * that comes from a test author (project name, test names, paths) is escaped
 * before it reaches the markup.
 */

import type { ReportSummary, TraceArtifact, TraceStatus } from '../types';
import { escapeHtml, formatDateTime, formatTraceTimestamp, humanBytes } from '../utils';

export const TRACE_VIEWER_DOCS_URL = 'https://playwright.dev/docs/trace-viewer';

export interface RenderReportInput {
  artifacts: TraceArtifact[];
  projectName: string;
  tracesDir: string;
  generatedAt: Date;
}

/**
 * Count archives by status. Legacy archives are `unknown` and count as neither
 * passed nor failed.
 */
export function summarizeArtifacts(artifacts: TraceArtifact[]): ReportSummary {
  const summary: ReportSummary = { total: artifacts.length, passed: 0, failed: 0, unknown: 0 };
  for (const artifact of artifacts) {
    if (artifact.status === 'pass') summary.passed++;
    else if (artifact.status === 'fail') summary.failed++;
    else summary.unknown++;
  }
  return summary;
}

/**
 * Command that opens one archive in the Playwright CLI viewer
 */
export function buildShowTraceCommand(tracesDir: string, filename: string): string {
  return `npx playwright show-trace ${tracesDir}/${filename}`;
}

/**
 * Link into the offline viewer copied to `<outputDir>/trace/`
 */
export function buildOfflineViewerUrl(filename: string): string {
  return `trace/index.html?trace=../${encodeURIComponent(filename)}`;
}

function generateStatusBadge(status: TraceStatus): string {
  switch (status) {
    case 'pass':
      return '<span class="badge badge-pass">PASS</span>';
    case 'fail':
      return '<span class="badge badge-fail">FAIL</span>';
    default:
      return '<span class="badge badge-unknown" title="Recorded before status tagging">?</span>';
  }
}

/**
 * Generate one table row for an archive
 */
export function generateTraceRow(artifact: TraceArtifact, tracesDir: string): string {
  const command = buildShowTraceCommand(tracesDir, artifact.filename);
  return `
      <tr class="trace-row" data-status="${artifact.status}">
        <td>${generateStatusBadge(artifact.status)}</td>
        <td class="trace-name" title="${escapeHtml(artifact.filename)}">${escapeHtml(artifact.displayName || 'Unknown')}</td>
        <td class="trace-time">${formatTraceTimestamp(artifact.createdAtMillis)}</td>
        <td class="trace-size">${humanBytes(artifact.sizeBytes)}</td>
        <td><code class="trace-cmd">${escapeHtml(command)}</code></td>
        <td><a class="trace-link" href="${escapeHtml(buildOfflineViewerUrl(artifact.filename))}">Open Trace Viewer &#8599;</a></td>
      </tr>`;
}

/**
 * Generate the summary counters
 */
export function generateSummary(summary: ReportSummary): string {
  const stat = (value: number, label: string, modifier: string) =>
    `<div class="stat ${modifier}"><div class="stat-value">${value}</div><div class="stat-label">${label}</div></div>`;

  return `
  <section class="card">
    <div class="card-header">Summary</div>
    <div class="stats">
      ${stat(summary.total, 'Total', 'stat-total')}
      ${stat(summary.passed, 'Passed', 'stat-passed')}
      ${stat(summary.failed, 'Failed', 'stat-failed')}
      ${stat(summary.unknown, 'Unknown', 'stat-unknown')}
    </div>
  </section>`;
}

/**
 * Generate the archive table, in the order the artifacts were given
 */
export function generateTraceTable(artifacts: TraceArtifact[], tracesDir: string): string {
  const rows = artifacts.length > 0
    ? artifacts.map(artifact => generateTraceRow(artifact, tracesDir)).join('')
    : `
      <tr class="empty-row"><td colspan="6">No trace archives found in <code>${escapeHtml(tracesDir)}</code></td></tr>`;

  return `
  <section class="card">
    <div class="card-header">Traces (${artifacts.length})</div>
    <table>
      <thead>
        <tr>
          <th>Status</th><th>Test Name</th><th>Recorded At</th><th>Size</th><th>CLI Command</th><th>Offline Viewer</th>
        </tr>
      </thead>
      <tbody>${rows}
      </tbody>
    </table>
  </section>`;
}

function generateStyles(): string {
  return `
  * { box-sizing: border-box; }
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; margin: 0; background: #fafafa; color: #1a1a1a; }
  header { background: #0d1117; color: #fff; padding: 20px 32px; }
  header h1 { margin: 0; font-size: 22px; font-weight: 600; }
  header p { margin: 4px 0 0; font-size: 13px; color: #8b949e; }
  .container { max-width: 1200px; margin: 24px auto; padding: 0 24px; }
  .card { background: #fff; border: 1px solid #e0e0e0; border-radius: 8px; box-shadow: 0 1px 3px rgba(0,0,0,.06); overflow: hidden; margin-bottom: 24px; }
  .card-header { padding: 14px 20px; border-bottom: 1px solid #e0e0e0; font-weight: 600; font-size: 14px; background: #f8f8f8; }
  .stats { display: flex; gap: 24px; padding: 20px; }
  .stat { text-align: center; min-width: 80px; }
  .stat-value { font-size: 32px; font-weight: 700; }
  .stat-label { font-size: 12px; color: #888; margin-top: 4px; }
  .stat-total .stat-value { color: #0078d4; }
  .stat-passed .stat-value { color: #2da44e; }
  .stat-failed .stat-value { color: #cf222e; }
  .stat-unknown .stat-value { color: #888; }
  table { width: 100%; border-collapse: collapse; font-size: 13px; }
  th { padding: 10px 12px; text-align: left; font-size: 12px; font-weight: 600; color: #555; border-bottom: 2px solid #e0e0e0; background: #f8f8f8; }
  td { padding: 8px 12px; border-bottom: 1px solid #f0f0f0; }
  tr:hover td { background: #f5f8ff; }
  .badge { display: inline-block; padding: 2px 8px; border-radius: 4px; font-size: 11px; font-weight: 600; color: #fff; }
  .badge-pass { background: #2da44e; }
  .badge-fail { background: #cf222e; }
  .badge-unknown { background: #888; }
  .trace-name { font-weight: 500; }
  .trace-time { color: #666; }
  .trace-size { color: #888; font-size: 12px; }
  .trace-cmd { display: block; font-size: 11px; background: #f4f4f4; padding: 2px 6px; border-radius: 3px; white-space: nowrap; overflow: auto; }
  .trace-link { font-size: 12px; color: #0078d4; text-decoration: none; font-weight: 500; }
  .empty-row td { text-align: center; color: #888; padding: 24px; }
  footer { text-align: center; padding: 20px; font-size: 12px; color: #999; }`;
}

/**
 * Render the complete dashboard document
 */
export function renderReport(input: RenderReportInput): string {
  const { artifacts, projectName, tracesDir, generatedAt } = input;
  const title = escapeHtml(projectName);

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${title} — Playwright Trace Report</title>
<style>${generateStyles()}
</style>
</head>
<body>
<header>
  <h1>${title}</h1>
  <p>Playwright Trace Report &mdash; generated <span class="generated-at">${formatDateTime(generatedAt)}</span></p>
</header>
<main class="container">${generateSummary(summarizeArtifacts(artifacts))}${generateTraceTable(artifacts, tracesDir)}
</main>
<footer>
  <a href="${TRACE_VIEWER_DOCS_URL}" target="_blank" rel="noopener">Playwright Trace Viewer docs</a>
</footer>
</body>
</html>
`;
}
