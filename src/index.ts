export type {
  TagStatus,
  TraceStatus,
  TraceFilenameParts,
  TraceArtifact,
  ReportSummary,
  ReportModel,
  ReportOptions,
  ResolvedReportConfig,
  ServerOptions,
  ResolvedServerConfig,
} from './types';

export {
  deriveSlug,
  buildTracePath,
  tagWithStatus,
  matchTraceFilename,
  parseTraceFilename,
  formatTraceFilename,
} from './naming';
export { ArtifactCollector, collectArtifacts } from './collectors';
export { renderReport, summarizeArtifacts, generateReport, buildReportModel, type GenerateReportOptions } from './generators';
export { locateViewerAssets, copyTree, copyViewerAssets } from './assets/viewer-assets';
export { createStaticServer, startStaticServer, stopStaticServer } from './server/static-server';
export { resolveReportConfig, resolveServerConfig } from './config';
export { humanBytes, formatDateTime, slugToDisplayName } from './utils';
