/**
 * Adjacency primitives
 *
 * Breadth-first search over an adjacency mapping, plus the scratch-copy
 * operations used by disjoint-path counting. Everything here works on any
 * supplied mapping, not only a graph's own, so searches can run against a
 * working copy with vertices or edges removed.
 */

/** Vertex id -> neighbor set */
export type Adjacency = Map<number, Set<number>>;

/** Read-only view handed out by Graph */
export type ReadonlyAdjacency = ReadonlyMap<number, ReadonlySet<number>>;

/**
 * Deep copy of an adjacency mapping. The copy is owned by the caller and can
 * be mutated freely without touching the source.
 */
export function cloneAdjacency(source: ReadonlyAdjacency): Adjacency {
  const copy: Adjacency = new Map();
  for (const [vertex, neighbors] of source) {
    copy.set(vertex, new Set(neighbors));
  }
  return copy;
}

/** Remove the undirected edge (u, v) from a working copy */
export function removeEdge(adjacency: Adjacency, u: number, v: number): void {
  adjacency.get(u)?.delete(v);
  adjacency.get(v)?.delete(u);
}

/**
 * Detach a vertex: delete all of its incident edges on both sides.
 * The vertex itself stays in the mapping with an empty neighbor set.
 */
export function detachVertex(adjacency: Adjacency, vertex: number): void {
  const neighbors = adjacency.get(vertex);
  if (!neighbors) return;

  for (const neighbor of [...neighbors]) {
    removeEdge(adjacency, vertex, neighbor);
  }
}

/**
 * Find a shortest path from s to t by BFS, recording a parent pointer for
 * each discovered vertex and walking back from t once it is dequeued.
 *
 * @returns the vertex sequence from s to t, or null if t is unreachable
 */
export function findPathInSubgraph(
  adjacency: ReadonlyAdjacency,
  s: number,
  t: number
): number[] | null {
  const visited = new Set<number>([s]);
  const parent = new Map<number, number>();
  const queue: number[] = [s];
  let head = 0;

  while (head < queue.length) {
    const u = queue[head++];

    if (u === t) {
      const path = [t];
      let current = t;
      while (current !== s) {
        const previous = parent.get(current);
        if (previous === undefined) break;
        current = previous;
        path.push(current);
      }
      return path.reverse();
    }

    for (const v of adjacency.get(u) ?? []) {
      if (!visited.has(v)) {
        visited.add(v);
        parent.set(v, u);
        queue.push(v);
      }
    }
  }

  return null;
}

/**
 * Count the vertices reachable from a start vertex (start included).
 */
export function countReachable(adjacency: ReadonlyAdjacency, start: number): number {
  const visited = new Set<number>([start]);
  const queue: number[] = [start];
  let head = 0;

  while (head < queue.length) {
    const v = queue[head++];
    for (const neighbor of adjacency.get(v) ?? []) {
      if (!visited.has(neighbor)) {
        visited.add(neighbor);
        queue.push(neighbor);
      }
    }
  }

  return visited.size;
}
