/**
 * Conversation graph: node arena, validation and linearization
 */

export { NodeStore, type MessageNode, type AuthorRole, type ConversationGraph } from './types.js';
export { parseGraph, ParsedGraph, type ChildrenRepair, type ParseGraphOptions } from './parser.js';
export { linearize, descendLastChild, type LinearThread, type LinearizationPolicy } from './linearize.js';
export {
  GraphError,
  MalformedGraphError,
  CyclicGraphError,
  isGraphError,
  type GraphErrorKind,
} from './errors.js';
