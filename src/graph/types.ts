/**
 * Conversation graph types
 * Nodes live in an arena keyed by id; edges are ids, never object references
 */

export type AuthorRole = 'system' | 'user' | 'assistant' | 'tool';

/**
 * One node of a conversation's raw graph, decoded and validated at the boundary
 */
export interface MessageNode {
  readonly id: string;
  readonly parentId: string | null;
  readonly childrenIds: readonly string[];
  /** `placeholder` nodes carry no message (the synthetic root, mostly) */
  readonly kind: 'message' | 'placeholder';
  readonly role: AuthorRole;
  readonly contentParts: readonly string[];
  /** Unix seconds */
  readonly createTime: number | null;
  readonly recipient: string | null;
  readonly hidden: boolean;
  readonly model: string | null;
}

/**
 * Id → node table for one conversation
 */
export class NodeStore {
  private readonly nodes = new Map<string, MessageNode>();

  constructor(nodes: Iterable<MessageNode> = []) {
    for (const node of nodes) {
      this.nodes.set(node.id, node);
    }
  }

  get(id: string): MessageNode | undefined {
    return this.nodes.get(id);
  }

  has(id: string): boolean {
    return this.nodes.has(id);
  }

  get size(): number {
    return this.nodes.size;
  }

  ids(): string[] {
    return [...this.nodes.keys()];
  }

  values(): MessageNode[] {
    return [...this.nodes.values()];
  }
}

/**
 * A conversation's node table plus the leaf the export marked as active
 */
export interface ConversationGraph {
  readonly store: NodeStore;
  readonly currentNodeId: string | null;
}
