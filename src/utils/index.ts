/**
 * Utility functions
 */

const INVALID_FILENAME_CHARS = /[<>:"/\\|?*]/g;
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/g;

/**
 * First `maxLength` code points of `text`; surrogate pairs are never split
 */
export function truncateCodePoints(text: string, maxLength: number): string {
  const points = Array.from(text);
  return points.length <= maxLength ? text : points.slice(0, maxLength).join('');
}

/**
 * Turn a title into a file or directory name that is safe on every platform
 */
export function sanitizeFilename(name: string, maxLength = 80): string {
  const replaced = name
    .replace(CONTROL_CHARS, '')
    .replace(INVALID_FILENAME_CHARS, '_');
  const cleaned = truncateCodePoints(replaced, maxLength)
    .trim()
    .replace(/\.+$/, '');

  return cleaned || 'untitled';
}

/**
 * Collapse runs of whitespace to single spaces
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Count whitespace-separated words
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Convert a Unix timestamp (seconds) to Date
 */
export function timestampToDate(timestamp: number | null | undefined): Date | null {
  if (timestamp == null || !Number.isFinite(timestamp)) return null;
  return new Date(timestamp * 1000);
}
