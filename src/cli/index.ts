#!/usr/bin/env node
/**
 * Threadline CLI - Main entry point
 */

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { Command } from 'commander';
import { version } from '../version.js';
import { registerCoreCommands } from './commands/index.js';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('threadline')
    .description('Browse, search and export branching chat-history archives')
    .version(version);

  registerCoreCommands(program);

  return program;
}

/**
 * True when this file is the process entry point (directly or through the bin link)
 */
function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isMainModule()) {
  const program = createProgram();
  program.parseAsync().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
}
