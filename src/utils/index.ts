export { humanBytes, formatDateTime, formatTraceTimestamp } from './formatters';
export { escapeHtml, deriveSlug, slugToDisplayName } from './sanitizers';
