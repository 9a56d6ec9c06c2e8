/**
 * Conversation entities produced by the parse pipeline
 */

import type { LinearizationPolicy } from '../graph/linearize.js';
import type { GraphErrorKind } from '../graph/errors.js';

/**
 * Roles that survive filtering into the visible thread
 */
export type ConversationalRole = 'user' | 'assistant';

/**
 * One message of a linear thread. Frozen once built.
 */
export interface Message {
  readonly nodeId: string;
  readonly role: ConversationalRole;
  readonly displayText: string;
  readonly timestamp: Date | null;
  /** 0-based position in the visible thread */
  readonly sequenceIndex: number;
  readonly model: string | null;
}

export interface Conversation {
  readonly id: string;
  readonly title: string;
  readonly createdAt: Date | null;
  readonly updatedAt: Date | null;
  readonly projectId: string | null;
  readonly projectName: string | null;
  readonly model: string | null;
  readonly messages: readonly Message[];
  readonly systemInstructions: readonly string[];
  readonly linearization: LinearizationPolicy;
}

/**
 * A user-defined folder of conversations. Holds ids only.
 */
export interface Project {
  readonly id: string;
  readonly name: string;
  /** Bucket name, unique across the export */
  readonly key: string;
  readonly conversationIds: readonly string[];
}

export type SkipKind = GraphErrorKind | 'InvalidRecord' | 'Unexpected';

export interface SkippedConversation {
  conversationId: string;
  /** Position of the record in the export */
  index: number;
  kind: SkipKind;
  reason: string;
}

export interface ParseResult {
  conversations: Conversation[];
  skipped: SkippedConversation[];
}
