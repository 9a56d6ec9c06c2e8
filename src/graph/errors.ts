/**
 * Graph validation errors
 * Each one costs a single conversation, never the whole export
 */

export type GraphErrorKind = 'MalformedGraph' | 'CyclicGraph';

export abstract class GraphError extends Error {
  abstract readonly kind: GraphErrorKind;
}

/**
 * Zero or several root nodes
 */
export class MalformedGraphError extends GraphError {
  readonly kind = 'MalformedGraph';

  constructor(message: string) {
    super(message);
    this.name = 'MalformedGraphError';
  }
}

/**
 * A traversal reached a node it had already visited
 */
export class CyclicGraphError extends GraphError {
  readonly kind = 'CyclicGraph';

  constructor(
    public readonly nodeId: string,
    public readonly path: readonly string[]
  ) {
    super(`Cycle detected at node ${nodeId} after ${path.length} step(s)`);
    this.name = 'CyclicGraphError';
  }
}

export function isGraphError(err: unknown): err is GraphError {
  return err instanceof GraphError;
}
