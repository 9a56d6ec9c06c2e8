/**
 * Markdown transcript rendering
 * Output format is consumed by downstream tools; keep it byte-stable.
 */

import type { Conversation, ConversationalRole, Message } from '../conversation/types.js';
import { formatDate, formatTimestamp, type FormatOptions } from '../normalize/content.js';

export type MarkdownOptions = FormatOptions;

export const ROLE_LABELS: Readonly<Record<ConversationalRole, { icon: string; label: string }>> = {
  user: { icon: '👤', label: 'User' },
  assistant: { icon: '🤖', label: 'Assistant' },
};

/**
 * Header line plus body for one message
 */
export function formatMessage(msg: Message, options: MarkdownOptions = {}): string[] {
  const { icon, label } = ROLE_LABELS[msg.role];
  return [
    `### ${icon} ${label} – ${formatTimestamp(msg.timestamp, options)}`,
    '',
    msg.displayText,
    '',
  ];
}

/**
 * Render a conversation as a markdown transcript, messages in thread order
 */
export function renderMarkdown(conv: Conversation, options: MarkdownOptions = {}): string {
  const lines = [
    `# ${conv.title}`,
    '',
    `**Project:** ${conv.projectName ?? 'None'}`,
    `**Created:** ${formatDate(conv.createdAt, options)}`,
    `**Last Updated:** ${formatDate(conv.updatedAt, options)}`,
    `**Model:** ${conv.model ?? 'unknown'}`,
    '',
    '---',
    '',
  ];

  for (const msg of conv.messages) {
    lines.push(...formatMessage(msg, options));
  }

  return lines.join('\n');
}
