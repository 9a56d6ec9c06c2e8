/**
 * Core CLI commands
 * stats, search, show, projects, export
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { getConfig } from '../../config/index.js';
import { loadExportRecords } from '../../ingest/loader.js';
import { ExportSession } from '../../session/index.js';
import { planBundle, writeBundle } from '../../export/bundle.js';
import { formatDate } from '../../normalize/content.js';

/** Options for the search command */
export interface SearchOptions {
  limit: string;
}

/** Options for the export command */
export interface ExportOptions {
  out?: string;
  dryRun?: boolean;
}

/**
 * Load an export into a fresh session, printing the skip report
 */
export async function loadSession(input: string | undefined): Promise<ExportSession> {
  const config = getConfig();
  const inputPath = input ?? config.exportPath;
  if (!inputPath) {
    throw new Error('No export given: pass a path or set THREADLINE_EXPORT_PATH');
  }

  const session = new ExportSession({
    titleMaxLength: config.titleMaxLength,
    timeZone: config.timeZone,
  });
  const { skipped } = session.load(await loadExportRecords(resolve(inputPath)));

  if (skipped.length > 0) {
    console.error(`Skipped ${skipped.length} conversation(s):`);
    for (const skip of skipped) {
      console.error(`  ! ${skip.conversationId} [${skip.kind}]: ${skip.reason}`);
    }
  }

  return session;
}

/**
 * Wrap a command action so failures print and set the exit code
 */
function run<A extends unknown[]>(label: string, action: (...args: A) => Promise<void>) {
  return async (...args: A): Promise<void> => {
    try {
      await action(...args);
    } catch (err) {
      console.error(`${label}:`, err instanceof Error ? err.message : err);
      process.exitCode = 1;
    }
  };
}

/**
 * Register core commands on the program
 */
export function registerCoreCommands(program: Command): void {
  // Stats command
  program
    .command('stats [input]')
    .description('Show conversation, message and project counts for an export')
    .action(run('Failed to read export', async (input: string | undefined) => {
      const stats = (await loadSession(input)).stats();

      console.log('Statistics:');
      console.log(`  Total conversations: ${stats.totalConversations}`);
      console.log(`  Total projects: ${stats.totalProjects}`);
      console.log(`  Unassigned conversations: ${stats.unassignedConversations}`);
      console.log(`  Total messages: ${stats.totalMessages}`);
      console.log(`  Total words: ${stats.totalWords}`);
      console.log(`  Skipped: ${stats.skippedCount}`);

      const models = Object.entries(stats.modelsUsed).sort((a, b) => b[1] - a[1]);
      if (models.length > 0) {
        console.log('\nModels used:');
        for (const [model, count] of models) {
          console.log(`  ${model}: ${count}`);
        }
      }
    }));

  // Search command
  program
    .command('search <query> [input]')
    .description('Find conversations whose title or messages contain the query')
    .option('--limit <n>', 'Maximum number of results', '20')
    .action(run('Search failed', async (query: string, input: string | undefined, options: SearchOptions) => {
      const limit = parseInt(options.limit, 10);
      const session = await loadSession(input);
      const results = session.search(query, Number.isNaN(limit) ? undefined : limit);
      const config = getConfig();

      if (results.length === 0) {
        console.log(`No conversations match "${query}"`);
        return;
      }

      console.log(`${results.length} result(s) for "${query}":`);
      for (const conv of results) {
        const updated = formatDate(conv.updatedAt, { timeZone: config.timeZone });
        console.log(`  ${conv.id}  ${conv.title}  (${updated}, ${conv.messages.length} messages)`);
      }
    }));

  // Show command
  program
    .command('show <id> [input]')
    .description('Print one conversation as markdown')
    .action(run('Failed to show conversation', async (id: string, input: string | undefined) => {
      const session = await loadSession(input);
      const conv = session.conversation(id);
      if (!conv) {
        throw new Error(`Conversation not found: ${id}`);
      }
      process.stdout.write(session.renderMarkdown(conv));
    }));

  // Projects command
  program
    .command('projects [input]')
    .description('List projects with their conversations, most recent first')
    .action(run('Failed to list projects', async (input: string | undefined) => {
      const groups = (await loadSession(input)).groupByProject();

      for (const [project, conversations] of groups) {
        console.log(`${project} (${conversations.length})`);
        for (const conv of conversations) {
          console.log(`  - ${conv.title}`);
        }
      }
    }));

  // Export command
  program
    .command('export [input]')
    .description('Write every conversation as markdown, one folder per project')
    .option('--out <dir>', 'Output directory')
    .option('--dry-run', 'List the files without writing them')
    .action(run('Failed to export', async (input: string | undefined, options: ExportOptions) => {
      const config = getConfig();
      const outputDir = resolve(options.out ?? config.outputDir);
      const session = await loadSession(input);

      const result = await writeBundle(planBundle(session.groupByProject()), outputDir, {
        dryRun: options.dryRun ?? config.dryRun,
        timeZone: config.timeZone,
      });

      console.log(`${result.dryRun ? 'Would write' : 'Wrote'} ${result.written.length} file(s) to ${outputDir}`);
      if (result.errors.length > 0) {
        console.log(`\nErrors (${result.errors.length}):`);
        for (const err of result.errors) {
          console.log(`  ! ${err.path}: ${err.error}`);
        }
        process.exitCode = 1;
      }
    }));
}
