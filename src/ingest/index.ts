/**
 * Export ingestion
 * Boundary schemas, record decoding and file loading
 */

export {
  ConversationRecordSchema,
  MappingEntrySchema,
  MappingSchema,
  RawMessageSchema,
  ContentSchema,
  ContentPartSchema,
  AuthorSchema,
  type ConversationRecord,
  type MappingEntry,
  type Mapping,
  type RawMessage,
  type Content,
  type ContentPart,
  type Author,
} from './types.js';

export {
  decodeRecord,
  decodeGraph,
  decodeNode,
  extractContentParts,
  resolveProject,
  resolveConversationId,
  type DecodeResult,
  type ProjectRef,
} from './decode.js';

export { LoadError, loadExportRecords, parseExportJson } from './loader.js';

export { extractZip, findConversationsJson, isZipFile, EXPORT_FILENAME } from './zip.js';
