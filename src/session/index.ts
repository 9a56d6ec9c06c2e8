/**
 * Export session
 * Holds one loaded export and the structures derived from it. Owned by the
 * caller (CLI, server); the parse pipeline itself keeps no state.
 */

import { parseConversations, type BuildOptions } from '../conversation/builder.js';
import { buildProjects, groupByProject } from '../conversation/projects.js';
import type { Conversation, ParseResult, Project, SkippedConversation } from '../conversation/types.js';
import { renderMarkdown, type MarkdownOptions } from '../export/markdown.js';
import { SearchIndex } from '../search/text.js';
import { countWords } from '../utils/index.js';

export interface ExportStats {
  totalConversations: number;
  totalMessages: number;
  /** Named projects; the unassigned bucket is not counted */
  totalProjects: number;
  skippedCount: number;
  unassignedConversations: number;
  totalWords: number;
  modelsUsed: Record<string, number>;
}

export interface SessionOptions extends BuildOptions, MarkdownOptions {}

/**
 * Everything derived from one export, swapped in as a unit
 */
interface Snapshot {
  conversations: readonly Conversation[];
  byId: ReadonlyMap<string, Conversation>;
  skipped: readonly SkippedConversation[];
  projects: readonly Project[];
  index: SearchIndex;
}

function emptySnapshot(): Snapshot {
  return {
    conversations: [],
    byId: new Map(),
    skipped: [],
    projects: buildProjects([]),
    index: SearchIndex.empty(),
  };
}

function buildSnapshot({ conversations, skipped }: ParseResult): Snapshot {
  const byId = new Map<string, Conversation>();
  for (const conv of conversations) {
    if (!byId.has(conv.id)) byId.set(conv.id, conv);
  }
  return {
    conversations: Object.freeze([...conversations]),
    byId,
    skipped: Object.freeze([...skipped]),
    projects: buildProjects(conversations),
    index: SearchIndex.build(conversations),
  };
}

export function conversationWordCount(conv: Conversation): number {
  return conv.messages.reduce((sum, m) => sum + countWords(m.displayText), 0);
}

export class ExportSession {
  private snapshot: Snapshot = emptySnapshot();

  constructor(private readonly options: SessionOptions = {}) {}

  /**
   * Parse `records` and replace everything derived from the previous export.
   * Nothing is visible until the new snapshot is complete.
   */
  load(records: readonly unknown[]): ParseResult {
    const result = parseConversations(records, this.options);
    this.snapshot = buildSnapshot(result);
    return result;
  }

  /**
   * Drop the loaded export
   */
  clear(): void {
    this.snapshot = emptySnapshot();
  }

  get conversations(): readonly Conversation[] {
    return this.snapshot.conversations;
  }

  get skipped(): readonly SkippedConversation[] {
    return this.snapshot.skipped;
  }

  conversation(id: string): Conversation | undefined {
    return this.snapshot.byId.get(id);
  }

  projects(): readonly Project[] {
    return this.snapshot.projects;
  }

  /**
   * Conversations whose title or messages contain `query` (case-insensitive),
   * most recently updated first
   */
  search(query: string, limit?: number): Conversation[] {
    return this.snapshot.index.matches(query, limit);
  }

  groupByProject(): Map<string, Conversation[]> {
    return groupByProject(this.snapshot.conversations);
  }

  renderMarkdown(conv: Conversation): string {
    return renderMarkdown(conv, this.options);
  }

  stats(): ExportStats {
    const { conversations, skipped, projects } = this.snapshot;
    const modelsUsed: Record<string, number> = {};
    let totalMessages = 0;
    let totalWords = 0;

    for (const conv of conversations) {
      totalMessages += conv.messages.length;
      totalWords += conversationWordCount(conv);
      if (conv.model) {
        modelsUsed[conv.model] = (modelsUsed[conv.model] ?? 0) + 1;
      }
    }

    return {
      totalConversations: conversations.length,
      totalMessages,
      totalProjects: projects.length - 1,
      skippedCount: skipped.length,
      unassignedConversations: conversations.filter(c => c.projectId === null).length,
      totalWords,
      modelsUsed,
    };
  }
}
