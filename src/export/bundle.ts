/**
 * Markdown bundle export
 * One file per conversation at `{project}/{title}.md`
 */

import { mkdir, writeFile } from 'fs/promises';
import { join, dirname } from 'path';
import type { Conversation } from '../conversation/types.js';
import { sanitizeFilename } from '../utils/index.js';
import { createLogger } from '../utils/logger.js';
import { renderMarkdown, type MarkdownOptions } from './markdown.js';

export interface BundleEntry {
  /** Relative path with forward slashes */
  path: string;
  conversation: Conversation;
}

export interface BundleOptions extends MarkdownOptions {
  dryRun?: boolean;
}

export interface BundleWriteResult {
  written: string[];
  errors: Array<{ path: string; conversationId: string; error: string }>;
  totalBytesWritten: number;
  dryRun: boolean;
}

/**
 * Pick `base`, or `base (2)`, `base (3)`, ... whichever is free.
 * `taken` holds lowercased names so case-insensitive file systems agree.
 */
export function uniqueName(base: string, taken: Set<string>): string {
  let candidate = base;
  for (let n = 2; taken.has(candidate.toLowerCase()); n++) {
    candidate = `${base} (${n})`;
  }
  taken.add(candidate.toLowerCase());
  return candidate;
}

/**
 * Assign each conversation a unique path inside its project directory
 */
export function planBundle(groups: ReadonlyMap<string, readonly Conversation[]>): BundleEntry[] {
  const entries: BundleEntry[] = [];
  const takenDirs = new Set<string>();

  for (const [project, conversations] of groups) {
    if (conversations.length === 0) continue;

    const dir = uniqueName(sanitizeFilename(project), takenDirs);
    const takenFiles = new Set<string>();

    for (const conversation of conversations) {
      const file = uniqueName(sanitizeFilename(conversation.title), takenFiles);
      entries.push({ path: `${dir}/${file}.md`, conversation });
    }
  }

  return entries;
}

/**
 * Write a planned bundle under `outputDir`
 */
export async function writeBundle(
  entries: readonly BundleEntry[],
  outputDir: string,
  options: BundleOptions = {}
): Promise<BundleWriteResult> {
  const log = createLogger({ module: 'bundle' });
  const dryRun = options.dryRun ?? false;
  const result: BundleWriteResult = { written: [], errors: [], totalBytesWritten: 0, dryRun };

  for (const { path, conversation } of entries) {
    const content = renderMarkdown(conversation, options);
    const filePath = join(outputDir, ...path.split('/'));

    if (dryRun) {
      result.written.push(filePath);
      continue;
    }

    try {
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, content, 'utf-8');
      result.written.push(filePath);
      result.totalBytesWritten += Buffer.byteLength(content, 'utf-8');
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      log.error({ path: filePath, conversationId: conversation.id, error }, 'Failed to write markdown file');
      result.errors.push({ path: filePath, conversationId: conversation.id, error });
    }
  }

  log.info(
    { files: result.written.length, errors: result.errors.length, dryRun },
    'Markdown bundle complete'
  );

  return result;
}
