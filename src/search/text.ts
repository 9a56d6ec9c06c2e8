/**
 * Full-text search over a loaded export
 *
 * Matching is a case-insensitive substring test against each conversation's
 * title and message text. No stemming, no ranking: results come back in
 * display order (most recently updated first, ties by title).
 * Titles and messages are joined with newlines, so a query only matches
 * across two messages if it contains a newline itself.
 * The query is matched as given, surrounding spaces included.
 */

import type { Conversation } from '../conversation/types.js';
import { sortByRecency } from '../conversation/projects.js';

export interface SearchEntry {
  readonly conversation: Conversation;
  /** Lowercased title and message text */
  readonly text: string;
}

/**
 * Lowercased searchable text for one conversation
 */
export function searchableText(conv: Conversation): string {
  return [conv.title, ...conv.messages.map(m => m.displayText)]
    .join('\n')
    .toLowerCase();
}

/**
 * Immutable snapshot index. Rebuild it whenever the conversation set changes.
 */
export class SearchIndex {
  private constructor(private readonly entries: readonly SearchEntry[]) {}

  static build(conversations: readonly Conversation[]): SearchIndex {
    const entries = sortByRecency(conversations).map(conv => Object.freeze({
      conversation: conv,
      text: searchableText(conv),
    }));
    return new SearchIndex(Object.freeze(entries));
  }

  static empty(): SearchIndex {
    return new SearchIndex([]);
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Matching conversations, in display order. A blank query matches nothing;
   * so does a limit below one.
   */
  matches(query: string, limit?: number): Conversation[] {
    if (!query.trim()) return [];
    if (limit !== undefined && limit < 1) return [];

    const needle = query.toLowerCase();
    const results: Conversation[] = [];
    for (const entry of this.entries) {
      if (entry.text.includes(needle)) {
        results.push(entry.conversation);
        if (limit !== undefined && results.length >= limit) break;
      }
    }
    return results;
  }

  /**
   * Ids of matching conversations, in display order
   */
  query(query: string, limit?: number): string[] {
    return this.matches(query, limit).map(conv => conv.id);
  }
}
