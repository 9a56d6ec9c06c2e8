/**
 * ZIP extraction for export archives
 * Handles archives with nested folder structures
 */

import { createWriteStream } from 'fs';
import { mkdir, rm, readdir } from 'fs/promises';
import { join, dirname, basename, resolve, sep } from 'path';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';
import { pipeline } from 'stream/promises';
import yauzl from 'yauzl';

export const EXPORT_FILENAME = 'conversations.json';

export interface ExtractionResult {
  tempDir: string;
  files: string[];
  conversationsJsonPath: string | null;
}

/**
 * Create a temporary directory for extraction
 */
export async function createTempDir(): Promise<string> {
  const tempDir = join(tmpdir(), `threadline-${randomUUID()}`);
  await mkdir(tempDir, { recursive: true });
  return tempDir;
}

export async function cleanupTempDir(tempDir: string): Promise<void> {
  await rm(tempDir, { recursive: true, force: true });
}

function openZipFile(zipPath: string): Promise<yauzl.ZipFile> {
  return new Promise((resolvePromise, reject) => {
    yauzl.open(zipPath, { lazyEntries: true }, (err, zipFile) => {
      if (err) reject(err);
      else if (zipFile) resolvePromise(zipFile);
      else reject(new Error('Failed to open ZIP file'));
    });
  });
}

function extractEntry(zipFile: yauzl.ZipFile, entry: yauzl.Entry, destPath: string): Promise<void> {
  return new Promise((resolvePromise, reject) => {
    zipFile.openReadStream(entry, (err, readStream) => {
      if (err) {
        reject(err);
        return;
      }
      if (!readStream) {
        reject(new Error('Failed to open read stream'));
        return;
      }

      mkdir(dirname(destPath), { recursive: true })
        .then(() => pipeline(readStream, createWriteStream(destPath)))
        .then(resolvePromise, reject);
    });
  });
}

/**
 * Entry path inside `root`, or null for entries that would escape it
 */
export function safeDestination(root: string, fileName: string): string | null {
  const dest = resolve(root, fileName);
  return dest.startsWith(resolve(root) + sep) ? dest : null;
}

/**
 * Extract a ZIP file to a fresh temporary directory
 */
export async function extractZip(zipPath: string): Promise<ExtractionResult> {
  const zipFile = await openZipFile(zipPath);
  const tempDir = await createTempDir();
  const files: string[] = [];
  let conversationsJsonPath: string | null = null;

  const extraction = new Promise<ExtractionResult>((resolvePromise, reject) => {
    zipFile.on('error', reject);

    zipFile.on('entry', (entry: yauzl.Entry) => {
      const fileName = entry.fileName;
      const destPath = safeDestination(tempDir, fileName);

      // Directories, macOS metadata, and paths outside the temp dir
      if (
        fileName.endsWith('/') ||
        fileName.includes('__MACOSX') ||
        basename(fileName).startsWith('.') ||
        destPath === null
      ) {
        zipFile.readEntry();
        return;
      }

      extractEntry(zipFile, entry, destPath).then(() => {
        files.push(destPath);
        if (basename(fileName) === EXPORT_FILENAME && conversationsJsonPath === null) {
          conversationsJsonPath = destPath;
        }
        zipFile.readEntry();
      }, reject);
    });

    zipFile.on('end', () => {
      resolvePromise({ tempDir, files, conversationsJsonPath });
    });

    zipFile.readEntry();
  });

  try {
    return await extraction;
  } catch (err) {
    zipFile.close();
    await cleanupTempDir(tempDir);
    throw err;
  }
}

/**
 * Find conversations.json in a directory (handles nested structures)
 */
export async function findConversationsJson(dir: string): Promise<string | null> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    if (entry.isFile() && entry.name === EXPORT_FILENAME) {
      return join(dir, entry.name);
    }
  }

  for (const entry of entries) {
    if (entry.isDirectory() && !entry.name.startsWith('.')) {
      const found = await findConversationsJson(join(dir, entry.name));
      if (found) return found;
    }
  }

  return null;
}

/**
 * Check if a file is a ZIP file by extension
 */
export function isZipFile(filePath: string): boolean {
  return filePath.toLowerCase().endsWith('.zip');
}
