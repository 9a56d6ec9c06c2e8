/**
 * Content normalizer
 * Flattens multi-part node content, decides which nodes belong in the
 * visible thread, and formats timestamps for display
 */

import type { MessageNode } from '../graph/types.js';
import type { ConversationalRole, Message } from '../conversation/types.js';
import { timestampToDate } from '../utils/index.js';

export const TIME_UNKNOWN = 'time unknown';

/**
 * Why a node is or is not shown
 */
export type NodeClass = 'conversational' | 'empty' | 'tool' | 'hidden' | 'system';

export interface FormatOptions {
  /** IANA zone; the process zone when absent */
  timeZone?: string;
}

/**
 * Join content parts with newlines, skipping blank parts
 */
export function joinContentParts(parts: readonly string[]): string {
  return parts
    .filter(part => part.trim() !== '')
    .join('\n')
    .trim();
}

/**
 * True when the node has no text to show (structural placeholders included)
 */
export function isFilterable(node: MessageNode): boolean {
  return node.kind === 'placeholder' || joinContentParts(node.contentParts) === '';
}

export function classifyNode(node: MessageNode): NodeClass {
  if (isFilterable(node)) return 'empty';
  if (node.role === 'tool') return 'tool';
  if (node.hidden) return 'hidden';
  if (node.role === 'system') return 'system';
  return 'conversational';
}

export interface NormalizedThread {
  messages: Message[];
  /** Text of system nodes on the thread; metadata only, never rendered */
  systemInstructions: string[];
}

/**
 * Turn a linear node sequence into display messages.
 * Tool, hidden and system nodes stay in the graph but leave the thread.
 */
export function normalizeThread(nodes: readonly MessageNode[]): NormalizedThread {
  const messages: Message[] = [];
  const systemInstructions: string[] = [];

  for (const node of nodes) {
    const nodeClass = classifyNode(node);

    if (nodeClass === 'system') {
      systemInstructions.push(joinContentParts(node.contentParts));
      continue;
    }
    if (nodeClass !== 'conversational') continue;

    const role: ConversationalRole = node.role === 'user' ? 'user' : 'assistant';
    messages.push(Object.freeze({
      nodeId: node.id,
      role,
      displayText: joinContentParts(node.contentParts),
      timestamp: timestampToDate(node.createTime),
      sequenceIndex: messages.length,
      model: node.model,
    }));
  }

  return { messages, systemInstructions };
}

function partsOf(
  date: Date,
  options: Intl.DateTimeFormatOptions,
  timeZone: string | undefined
): Record<string, string> {
  const parts: Record<string, string> = {};
  for (const part of new Intl.DateTimeFormat('en-US', { ...options, timeZone }).formatToParts(date)) {
    parts[part.type] = part.value;
  }
  return parts;
}

/**
 * Message timestamp, e.g. `Feb 01, 2024 09:05 PM`
 */
export function formatTimestamp(date: Date | null, options: FormatOptions = {}): string {
  if (!date || Number.isNaN(date.getTime())) return TIME_UNKNOWN;

  const p = partsOf(date, {
    month: 'short',
    day: '2-digit',
    year: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    hour12: true,
  }, options.timeZone);

  return `${p.month} ${p.day}, ${p.year} ${p.hour}:${p.minute} ${p.dayPeriod}`;
}

/**
 * Calendar date, e.g. `February 01, 2024`
 */
export function formatDate(date: Date | null, options: FormatOptions = {}): string {
  if (!date || Number.isNaN(date.getTime())) return TIME_UNKNOWN;

  const p = partsOf(date, { month: 'long', day: '2-digit', year: 'numeric' }, options.timeZone);

  return `${p.month} ${p.day}, ${p.year}`;
}
