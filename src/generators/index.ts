export {
  renderReport,
  summarizeArtifacts,
  generateSummary,
  generateTraceRow,
  generateTraceTable,
  buildShowTraceCommand,
  buildOfflineViewerUrl,
  type RenderReportInput,
} from './html-generator';
export { generateReport, buildReportModel, REPORT_FILENAME, type GenerateReportOptions } from './report-generator';
