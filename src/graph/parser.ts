/**
 * Graph parser
 * Validates a conversation's node table and indexes its parent/child edges
 */

import type pino from 'pino';
import { createLogger } from '../utils/logger.js';
import { CyclicGraphError, MalformedGraphError } from './errors.js';
import type { MessageNode, NodeStore } from './types.js';

/**
 * A child list that disagreed with the parent links and was rebuilt
 */
export interface ChildrenRepair {
  nodeId: string;
  /** Declared children that are missing or name another parent */
  dropped: string[];
  /** Nodes pointing at this parent that its child list omitted */
  added: string[];
}

export interface ParseGraphOptions {
  logger?: pino.Logger;
}

/**
 * Order for children the export forgot to list: oldest first, then by id
 */
function compareUndeclared(a: MessageNode, b: MessageNode): number {
  const ta = a.createTime ?? Number.NEGATIVE_INFINITY;
  const tb = b.createTime ?? Number.NEGATIVE_INFINITY;
  if (ta !== tb) return ta < tb ? -1 : 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Indexed, validated view over a NodeStore. Read-only.
 */
export class ParsedGraph {
  constructor(
    private readonly store: NodeStore,
    private readonly rootId: string,
    private readonly childIndex: ReadonlyMap<string, readonly string[]>,
    readonly repairs: readonly ChildrenRepair[]
  ) {}

  root(): MessageNode {
    return this.node(this.rootId);
  }

  has(id: string): boolean {
    return this.store.has(id);
  }

  node(id: string): MessageNode {
    const node = this.store.get(id);
    if (!node) {
      throw new Error(`Unknown node: ${id}`);
    }
    return node;
  }

  /**
   * Children derived from parent links, in export order
   */
  children(id: string): readonly string[] {
    return this.childIndex.get(id) ?? [];
  }

  /**
   * Parent of a node, or null for the root
   */
  parent(id: string): string | null {
    if (id === this.rootId) return null;
    const parentId = this.node(id).parentId;
    return parentId !== null && this.store.has(parentId) ? parentId : null;
  }

  /**
   * Nodes without children
   */
  leaves(): string[] {
    return this.store.ids().filter(id => this.children(id).length === 0);
  }

  /**
   * Ancestor chain from `leafId` up to and including the root
   * @throws CyclicGraphError if the chain loops
   * @throws MalformedGraphError if the chain ends somewhere other than the root
   */
  pathToRoot(leafId: string): string[] {
    const path: string[] = [];
    const visited = new Set<string>();
    let current: string | null = leafId;

    while (current !== null) {
      if (visited.has(current)) {
        throw new CyclicGraphError(current, path);
      }
      visited.add(current);
      path.push(current);
      current = this.parent(current);
    }

    if (path[path.length - 1] !== this.rootId) {
      throw new MalformedGraphError(`Node ${leafId} is not connected to root ${this.rootId}`);
    }

    return path;
  }
}

/**
 * Find the single root. A parent id that resolves to nothing counts as no parent.
 */
function findRoot(store: NodeStore): string {
  const roots = store
    .values()
    .filter(node => node.parentId === null || !store.has(node.parentId))
    .map(node => node.id);

  if (roots.length === 0) {
    throw new MalformedGraphError(
      store.size === 0 ? 'Conversation has no nodes' : 'No root node found'
    );
  }
  if (roots.length > 1) {
    const shown = roots.slice(0, 5).join(', ');
    throw new MalformedGraphError(`Found ${roots.length} root nodes (${shown})`);
  }
  return roots[0];
}

/**
 * Validate a node table and build its child index.
 * `parentId` is authoritative; declared child lists are checked against it
 * and rebuilt where they disagree.
 */
export function parseGraph(store: NodeStore, options: ParseGraphOptions = {}): ParsedGraph {
  const rootId = findRoot(store);
  const log = options.logger ?? createLogger({ module: 'graph' });

  const claimed = new Map<string, MessageNode[]>();
  for (const node of store.values()) {
    if (node.id === rootId || node.parentId === null) continue;
    const siblings = claimed.get(node.parentId);
    if (siblings) siblings.push(node);
    else claimed.set(node.parentId, [node]);
  }

  const childIndex = new Map<string, string[]>();
  const repairs: ChildrenRepair[] = [];

  for (const node of store.values()) {
    const actual = claimed.get(node.id) ?? [];
    const actualIds = new Set(actual.map(child => child.id));

    const kept: string[] = [];
    const dropped: string[] = [];
    for (const childId of node.childrenIds) {
      if (actualIds.has(childId) && !kept.includes(childId)) kept.push(childId);
      else dropped.push(childId);
    }

    const added = actual
      .filter(child => !kept.includes(child.id))
      .sort(compareUndeclared)
      .map(child => child.id);

    if (dropped.length > 0 || added.length > 0) {
      repairs.push({ nodeId: node.id, dropped, added });
      log.warn({ nodeId: node.id, dropped, added }, 'Rebuilt child list from parent links');
    }

    const children = [...kept, ...added];
    if (children.length > 0) {
      childIndex.set(node.id, children);
    }
  }

  return new ParsedGraph(store, rootId, childIndex, repairs);
}
