/**
 * Markdown rendering and bundle export
 */

export { renderMarkdown, formatMessage, ROLE_LABELS, type MarkdownOptions } from './markdown.js';
export {
  planBundle,
  writeBundle,
  uniqueName,
  type BundleEntry,
  type BundleOptions,
  type BundleWriteResult,
} from './bundle.js';
