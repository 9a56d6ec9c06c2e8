/**
 * Conversation building and project grouping
 */

export {
  parseConversations,
  parseConversations as parse,
  buildConversation,
  deriveTitle,
  DEFAULT_TITLE,
  DEFAULT_TITLE_MAX_LENGTH,
  type BuildOptions,
} from './builder.js';
export {
  groupByProject,
  buildProjects,
  compareByRecency,
  sortByRecency,
  UNASSIGNED_PROJECT,
} from './projects.js';
export type {
  Conversation,
  ConversationalRole,
  Message,
  Project,
  ParseResult,
  SkippedConversation,
  SkipKind,
} from './types.js';
