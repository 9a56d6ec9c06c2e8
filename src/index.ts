/**
 * Threadline - chat export linearizer
 * Main library entry point
 */

export * from './config/index.js';
export * from './graph/index.js';
export * from './conversation/index.js';
export * from './ingest/index.js';
export * from './export/index.js';
export {
  joinContentParts,
  classifyNode,
  normalizeThread,
  formatTimestamp,
  formatDate,
  TIME_UNKNOWN,
  type NodeClass,
  type FormatOptions,
} from './normalize/content.js';
export { SearchIndex, searchableText } from './search/text.js';
export { ExportSession, type ExportStats, type SessionOptions } from './session/index.js';
export { getLogger, createLogger } from './utils/logger.js';
export { version } from './version.js';
