/**
 * Builders for raw export records used across tests
 */

import type { MessageNode } from '../graph/types.js';

export interface NodeInit {
  id: string;
  parent: string | null;
  /** Derived from the other nodes' `parent` when omitted */
  children?: string[];
  /** Omit for a placeholder node without a message */
  role?: string;
  parts?: unknown[];
  text?: string;
  contentType?: string;
  time?: number;
  hidden?: boolean;
  recipient?: string;
  model?: string;
}

export interface RecordInit {
  id?: string;
  title?: string | null;
  create?: number;
  update?: number;
  current?: string | null;
  model?: string;
  extra?: Record<string, unknown>;
  nodes: NodeInit[];
}

function mappingEntry(init: NodeInit, all: NodeInit[]): Record<string, unknown> {
  const children = init.children ?? all.filter(other => other.parent === init.id).map(other => other.id);
  const entry: Record<string, unknown> = { id: init.id, parent: init.parent, children, message: null };

  if (init.role !== undefined) {
    const metadata: Record<string, unknown> = {};
    if (init.hidden) metadata.is_visually_hidden_from_conversation = true;
    if (init.model) metadata.model_slug = init.model;

    const content: Record<string, unknown> = { content_type: init.contentType ?? 'text' };
    if (init.text !== undefined) content.text = init.text;
    else content.parts = init.parts ?? [];

    entry.message = {
      id: init.id,
      author: { role: init.role },
      create_time: init.time ?? null,
      content,
      metadata,
      recipient: init.recipient ?? 'all',
    };
  }
  return entry;
}

/**
 * A raw conversation record as found in conversations.json
 */
export function makeRecord(init: RecordInit): Record<string, unknown> {
  const mapping: Record<string, unknown> = {};
  for (const node of init.nodes) {
    mapping[node.id] = mappingEntry(node, init.nodes);
  }

  const record: Record<string, unknown> = {
    title: init.title === undefined ? 'Test Conversation' : init.title,
    create_time: init.create ?? 1706745600,
    update_time: init.update ?? 1706749200,
    mapping,
    ...init.extra,
  };
  if (init.id !== undefined) record.id = init.id;
  if (init.current !== undefined) record.current_node = init.current;
  if (init.model !== undefined) record.default_model_slug = init.model;
  return record;
}

/**
 * root → user → assistant, current node on the assistant reply
 */
export function simpleRecord(id: string, overrides: Partial<RecordInit> = {}): Record<string, unknown> {
  return makeRecord({
    id,
    current: `${id}-a`,
    nodes: [
      { id: `${id}-root`, parent: null },
      { id: `${id}-u`, parent: `${id}-root`, role: 'user', parts: ['Hello there'], time: 1706745600 },
      { id: `${id}-a`, parent: `${id}-u`, role: 'assistant', parts: ['Hi! How can I help?'], time: 1706745660, model: 'gpt-4o' },
    ],
    ...overrides,
  });
}

/**
 * A decoded node for graph-level tests
 */
export function makeNode(
  id: string,
  parentId: string | null,
  childrenIds: string[] = [],
  overrides: Partial<MessageNode> = {}
): MessageNode {
  return {
    id,
    parentId,
    childrenIds,
    kind: 'message',
    role: 'user',
    contentParts: [`text of ${id}`],
    createTime: null,
    recipient: null,
    hidden: false,
    model: null,
    ...overrides,
  };
}
