/**
 * Graph errors
 *
 * The engine raises exactly two kinds of error, both before any mutation:
 * - InvalidVertex: a vertex id outside [0, vertexCount)
 * - SelfLoop: an edge from a vertex to itself
 */

export type GraphErrorKind = 'InvalidVertex' | 'SelfLoop';

export abstract class GraphError extends Error {
  abstract readonly kind: GraphErrorKind;
}

export class InvalidVertexError extends GraphError {
  readonly kind = 'InvalidVertex' as const;

  constructor(
    readonly vertex: number,
    readonly vertexCount: number,
  ) {
    super(`Vertex ${vertex} is out of bounds for a graph with ${vertexCount} vertices`);
    this.name = 'InvalidVertexError';
  }
}

export class SelfLoopError extends GraphError {
  readonly kind = 'SelfLoop' as const;

  constructor(readonly vertex: number) {
    super(`Self-loops are not allowed (vertex ${vertex})`);
    this.name = 'SelfLoopError';
  }
}

/** Type guard used by callers that translate errors for a host surface */
export function isGraphError(err: unknown): err is GraphError {
  return err instanceof GraphError;
}
