/**
 * Export loading
 * Reads the conversation record array from a JSON file, a directory or a ZIP archive
 */

import { readFile, stat } from 'fs/promises';
import { createLogger } from '../utils/logger.js';
import { cleanupTempDir, extractZip, findConversationsJson, isZipFile, EXPORT_FILENAME } from './zip.js';

export class LoadError extends Error {
  constructor(message: string, public readonly path: string) {
    super(message);
    this.name = 'LoadError';
  }
}

/**
 * Parse export JSON; the top level must be an array of records
 */
export function parseExportJson(jsonContent: string, path = '<input>'): unknown[] {
  let data: unknown;
  try {
    data = JSON.parse(jsonContent);
  } catch (err) {
    throw new LoadError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`, path);
  }

  if (!Array.isArray(data)) {
    throw new LoadError(`Expected an array of conversations, got ${data === null ? 'null' : typeof data}`, path);
  }
  return data;
}

async function readExportFile(filePath: string): Promise<unknown[]> {
  return parseExportJson(await readFile(filePath, 'utf-8'), filePath);
}

/**
 * Load raw records from `inputPath`
 * @throws LoadError when no conversations.json is found or it is not an array
 */
export async function loadExportRecords(inputPath: string): Promise<unknown[]> {
  const log = createLogger({ module: 'loader' });
  const info = await stat(inputPath);

  if (info.isDirectory()) {
    const found = await findConversationsJson(inputPath);
    if (!found) {
      throw new LoadError(`${EXPORT_FILENAME} not found in directory`, inputPath);
    }
    log.debug({ path: found }, 'Reading export from directory');
    return readExportFile(found);
  }

  if (isZipFile(inputPath)) {
    const extraction = await extractZip(inputPath);
    try {
      const found = extraction.conversationsJsonPath ?? await findConversationsJson(extraction.tempDir);
      if (!found) {
        throw new LoadError(`${EXPORT_FILENAME} not found in ZIP file`, inputPath);
      }
      log.debug({ path: inputPath, files: extraction.files.length }, 'Reading export from ZIP');
      return await readExportFile(found);
    } finally {
      await cleanupTempDir(extraction.tempDir);
    }
  }

  return readExportFile(inputPath);
}
