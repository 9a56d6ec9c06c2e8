/**
 * Conversation builder
 * Runs decode → graph parse → linearize → normalize for each export record
 */

import type pino from 'pino';
import { parseGraph } from '../graph/parser.js';
import { linearize } from '../graph/linearize.js';
import { isGraphError } from '../graph/errors.js';
import { normalizeThread } from '../normalize/content.js';
import {
  decodeRecord,
  decodeGraph,
  peekConversationId,
  resolveConversationId,
  resolveProject,
} from '../ingest/decode.js';
import type { ConversationRecord } from '../ingest/types.js';
import { collapseWhitespace, timestampToDate, truncateCodePoints } from '../utils/index.js';
import { createLogger } from '../utils/logger.js';
import { sortByRecency } from './projects.js';
import type { Conversation, Message, ParseResult, SkippedConversation } from './types.js';

export const DEFAULT_TITLE = 'Untitled Conversation';
export const DEFAULT_TITLE_MAX_LENGTH = 50;
export const TITLE_ELLIPSIS = '...';

export interface BuildOptions {
  /** Maximum length of a title derived from the first user message */
  titleMaxLength?: number;
  logger?: pino.Logger;
}

/**
 * Title from the first user message: whitespace collapsed, cut at
 * `maxLength` characters with an ellipsis
 */
export function deriveTitle(
  messages: readonly Message[],
  maxLength: number = DEFAULT_TITLE_MAX_LENGTH
): string {
  const first = messages.find(m => m.role === 'user');
  if (!first) return DEFAULT_TITLE;

  const text = collapseWhitespace(first.displayText);
  if (!text) return DEFAULT_TITLE;
  const truncated = truncateCodePoints(text, maxLength);
  if (truncated === text) return text;

  return truncated.trimEnd() + TITLE_ELLIPSIS;
}

/**
 * Build one conversation from a validated record
 * @throws GraphError when the graph is malformed or cyclic
 */
export function buildConversation(
  record: ConversationRecord,
  index: number,
  options: BuildOptions = {}
): Conversation {
  const id = resolveConversationId(record, index);
  const log = options.logger ?? createLogger({ module: 'builder' });

  const { store, currentNodeId } = decodeGraph(record);
  const graph = parseGraph(store, { logger: log.child({ conversationId: id }) });
  const thread = linearize(graph, currentNodeId);

  if (thread.policy === 'last-child') {
    log.debug(
      { conversationId: id, currentNode: currentNodeId },
      'Current node missing or unresolvable; using last-child linearization'
    );
  }

  const { messages, systemInstructions } = normalizeThread(thread.nodes);
  if (messages.length === 0) {
    log.debug({ conversationId: id }, 'Conversation has no visible messages');
  }

  const explicitTitle = record.title?.trim();
  const project = resolveProject(record);
  const model = record.default_model_slug
    || messages.find(m => m.role === 'assistant' && m.model)?.model
    || null;

  return Object.freeze({
    id,
    title: explicitTitle || deriveTitle(messages, options.titleMaxLength),
    createdAt: timestampToDate(record.create_time),
    updatedAt: timestampToDate(record.update_time),
    projectId: project?.id ?? null,
    projectName: project?.name ?? null,
    model,
    messages: Object.freeze(messages),
    systemInstructions: Object.freeze(systemInstructions),
    linearization: thread.policy,
  });
}

/**
 * Parse a decoded export. Failures cost only the conversation they occur in
 * and are reported in `skipped`, in record order.
 * Conversations come back most recently updated first.
 */
export function parseConversations(
  records: readonly unknown[],
  options: BuildOptions = {}
): ParseResult {
  const log = options.logger ?? createLogger({ module: 'builder' });
  const conversations: Conversation[] = [];
  const skipped: SkippedConversation[] = [];

  records.forEach((data, index) => {
    const decoded = decodeRecord(data);
    if (!decoded.success) {
      skipped.push({
        conversationId: peekConversationId(data, index),
        index,
        kind: 'InvalidRecord',
        reason: decoded.reason,
      });
      return;
    }

    try {
      conversations.push(buildConversation(decoded.record, index, { ...options, logger: log }));
    } catch (err) {
      skipped.push({
        conversationId: resolveConversationId(decoded.record, index),
        index,
        kind: isGraphError(err) ? err.kind : 'Unexpected',
        reason: err instanceof Error ? err.message : String(err),
      });
    }
  });

  for (const skip of skipped) {
    log.warn(skip, 'Skipped conversation');
  }
  log.info(
    { conversations: conversations.length, skipped: skipped.length },
    'Parsed export'
  );

  return {
    conversations: sortByRecency(conversations),
    skipped,
  };
}
