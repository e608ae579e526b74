/**
 * Report Generator - scans a traces directory and writes `<outputDir>/index.html`
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ReportModel, ReportOptions } from '../types';
import { resolveReportConfig } from '../config';
import { collectArtifacts } from '../collectors';
import { copyViewerAssets, type LocateViewerOptions } from '../assets/viewer-assets';
import { renderReport, summarizeArtifacts } from './html-generator';

export const REPORT_FILENAME = 'index.html';

export interface GenerateReportOptions extends ReportOptions {
  /** Timestamp shown in the header; defaults to now */
  generatedAt?: Date;
  /** Where to look for the viewer bundle */
  viewer?: LocateViewerOptions;
}

export function buildReportModel(tracesDir: string): ReportModel {
  const artifacts = collectArtifacts(tracesDir);
  return { artifacts, summary: summarizeArtifacts(artifacts) };
}

/**
 * Generate the dashboard and return the absolute path of the written file.
 *
 * Viewer-asset problems only warn. Failing to create `outputDir` or to write
 * the report throws. Running it twice over the same archives yields the
 * same document apart from the generated-at stamp.
 */
export function generateReport(options: GenerateReportOptions = {}): string {
  const config = resolveReportConfig(options);

  fs.mkdirSync(config.outputDir, { recursive: true });

  if (config.copyViewerAssets) {
    copyViewerAssets(config.outputDir, options.viewer);
  }

  const model = buildReportModel(config.tracesDir);
  const html = renderReport({
    artifacts: model.artifacts,
    projectName: config.projectName,
    tracesDir: config.tracesDir,
    generatedAt: options.generatedAt ?? new Date(),
  });

  const reportPath = path.resolve(config.outputDir, REPORT_FILENAME);
  fs.writeFileSync(reportPath, html);
  return reportPath;
}
