/**
 * Linearizer
 * Picks the one root → leaf path that was on screen at export time
 */

import { isFilterable } from '../normalize/content.js';
import { CyclicGraphError } from './errors.js';
import type { ParsedGraph } from './parser.js';
import type { MessageNode } from './types.js';

/**
 * How the thread was chosen.
 * - `current-node`: walked up from the export's current node pointer
 * - `last-child`: the pointer was absent or dangling, so the walk went down
 *   from the root taking the last child at every fork. Exports append newer
 *   regenerations, so this usually lands on the latest branch, but nothing
 *   in the format guarantees it.
 */
export type LinearizationPolicy = 'current-node' | 'last-child';

export interface LinearThread {
  policy: LinearizationPolicy;
  /** Every node id on the chosen path, root first */
  path: string[];
  /** Nodes on the path that carry text, root first */
  nodes: MessageNode[];
}

/**
 * Walk down from the root, taking the last child at each fork
 */
export function descendLastChild(graph: ParsedGraph): string[] {
  const path: string[] = [];
  const visited = new Set<string>();
  let current: string | undefined = graph.root().id;

  while (current !== undefined) {
    if (visited.has(current)) {
      throw new CyclicGraphError(current, path);
    }
    visited.add(current);
    path.push(current);

    const children = graph.children(current);
    current = children[children.length - 1];
  }

  return path;
}

/**
 * Linearize a parsed graph
 * @throws CyclicGraphError
 */
export function linearize(graph: ParsedGraph, currentNodeId: string | null): LinearThread {
  let policy: LinearizationPolicy;
  let path: string[];

  if (currentNodeId !== null && graph.has(currentNodeId)) {
    policy = 'current-node';
    path = graph.pathToRoot(currentNodeId).reverse();
  } else {
    policy = 'last-child';
    path = descendLastChild(graph);
  }

  const nodes = path
    .map(id => graph.node(id))
    .filter(node => !isFilterable(node));

  return { policy, path, nodes };
}
