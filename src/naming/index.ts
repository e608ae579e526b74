export { buildTracePath, tagWithStatus, deriveSlug } from './artifact-namer';
export {
  matchTraceFilename,
  parseTraceFilename,
  formatTraceFilename,
  TRACE_EXTENSION,
  type TraceFilenameMatch,
} from './trace-filename';
