/**
 * Boundary decoding
 * Validates raw export records once and turns mapping entries into MessageNodes
 */

import type { ZodError } from 'zod';
import { NodeStore, type AuthorRole, type MessageNode, type ConversationGraph } from '../graph/types.js';
import {
  ConversationRecordSchema,
  type ConversationRecord,
  type MappingEntry,
  type RawMessage,
} from './types.js';

const AUTHOR_ROLES: readonly AuthorRole[] = ['system', 'user', 'assistant', 'tool'];

/**
 * Content types that are scaffolding rather than conversation
 */
const HIDDEN_CONTENT_TYPES: ReadonlySet<string> = new Set([
  'user_editable_context',
  'model_editable_context',
  'system_error',
]);

export type DecodeResult =
  | { success: true; record: ConversationRecord }
  | { success: false; reason: string };

/**
 * Summarize the first few zod issues
 */
function describeIssues(error: ZodError): string {
  return error.issues
    .slice(0, 3)
    .map(issue => `${issue.path.join('.') || '(record)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate one raw conversation record
 */
export function decodeRecord(data: unknown): DecodeResult {
  const result = ConversationRecordSchema.safeParse(data);
  if (!result.success) {
    return { success: false, reason: `Invalid record: ${describeIssues(result.error)}` };
  }
  return { success: true, record: result.data };
}

function isAuthorRole(role: string): role is AuthorRole {
  return AUTHOR_ROLES.some(known => known === role);
}

/**
 * Unknown author roles are treated as tool output
 */
function toRole(role: string): AuthorRole {
  return isAuthorRole(role) ? role : 'tool';
}

/**
 * Text fragments of a message; non-text parts (images, assets) are dropped
 */
export function extractContentParts(message: RawMessage): string[] {
  const content = message.content;
  if (!content) return [];

  if (content.parts && content.parts.length > 0) {
    const parts: string[] = [];
    for (const part of content.parts) {
      if (typeof part === 'string') parts.push(part);
      else if (part && typeof part.text === 'string') parts.push(part.text);
    }
    return parts;
  }

  if (typeof content.text === 'string') {
    return [content.text];
  }

  return [];
}

function isHidden(message: RawMessage): boolean {
  if (message.metadata?.is_visually_hidden_from_conversation) return true;
  if (message.recipient && message.recipient !== 'all') return true;
  return message.content != null && HIDDEN_CONTENT_TYPES.has(message.content.content_type);
}

/**
 * Decode one mapping entry. The mapping key is the node id.
 */
export function decodeNode(id: string, entry: MappingEntry): MessageNode {
  const base = {
    id,
    parentId: entry.parent ?? null,
    childrenIds: entry.children,
  };
  const message = entry.message;

  if (!message) {
    return {
      ...base,
      kind: 'placeholder',
      role: 'system',
      contentParts: [],
      createTime: null,
      recipient: null,
      hidden: true,
      model: null,
    };
  }

  return {
    ...base,
    kind: 'message',
    role: toRole(message.author.role),
    contentParts: extractContentParts(message),
    createTime: message.create_time ?? null,
    recipient: message.recipient ?? null,
    hidden: isHidden(message),
    model: message.metadata?.model_slug ?? null,
  };
}

/**
 * Build the node arena and current-node pointer for a record
 */
export function decodeGraph(record: ConversationRecord): ConversationGraph {
  const nodes = Object.entries(record.mapping).map(([id, entry]) => decodeNode(id, entry));
  return {
    store: new NodeStore(nodes),
    currentNodeId: record.current_node ?? null,
  };
}

export interface ProjectRef {
  id: string;
  name: string;
}

/**
 * Project association: first id field present wins; unnamed projects are named by id
 */
export function resolveProject(record: ConversationRecord): ProjectRef | null {
  const candidates: Array<[string | null | undefined, string | null | undefined]> = [
    [record.project_id, record.project_name],
    [record.folder_id, record.folder_name],
    [record.gizmo_id, record.gizmo_name],
    [record.conversation_template_id, record.conversation_template_name],
    [record.workspace_id, null],
  ];

  for (const [id, name] of candidates) {
    if (id && id.trim()) {
      return { id, name: name?.trim() || id };
    }
  }
  return null;
}

/**
 * Conversation id: explicit id, then conversation_id, then position
 */
export function resolveConversationId(record: ConversationRecord, index: number): string {
  return record.id || record.conversation_id || `conv-${index}`;
}

/**
 * Best-effort id for records that failed validation
 */
export function peekConversationId(data: unknown, index: number): string {
  if (typeof data === 'object' && data !== null) {
    for (const key of ['id', 'conversation_id']) {
      const value: unknown = Reflect.get(data, key);
      if (typeof value === 'string' && value) return value;
    }
  }
  return `conv-${index}`;
}
