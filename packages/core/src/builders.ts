/**
 * Graph builders for the standard shapes the classifiers recognise
 */

import { Graph } from './graph.js';

/** Build a graph on n vertices from an edge list (duplicates are no-ops) */
export function graphFromEdges(n: number, edges: Iterable<readonly [number, number]>): Graph {
  const graph = new Graph(n);
  for (const [u, v] of edges) {
    graph.addEdge(u, v);
  }
  return graph;
}

/** K_n */
export function completeGraph(n: number): Graph {
  const graph = new Graph(n);
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      graph.addEdge(i, j);
    }
  }
  return graph;
}

/**
 * C_n: edges (i, i+1 mod n). Below 3 vertices the closing edge would be a
 * self-loop or a repeat, so n = 1 has no edges and n = 2 a single edge.
 */
export function cycleGraph(n: number): Graph {
  const graph = new Graph(n);
  for (let i = 0; i < n; i++) {
    const j = (i + 1) % n;
    if (i !== j) graph.addEdge(i, j);
  }
  return graph;
}

/** Star with center 0 and n-1 leaves */
export function starGraph(n: number): Graph {
  const graph = new Graph(n);
  for (let i = 1; i < n; i++) {
    graph.addEdge(0, i);
  }
  return graph;
}

/** P_n: 0 - 1 - ... - (n-1) */
export function pathGraph(n: number): Graph {
  const graph = new Graph(n);
  for (let i = 0; i + 1 < n; i++) {
    graph.addEdge(i, i + 1);
  }
  return graph;
}

export const PETERSEN_EDGES: ReadonlyArray<readonly [number, number]> = [
  // outer pentagon
  [0, 1], [1, 2], [2, 3], [3, 4], [4, 0],
  // spokes
  [0, 5], [1, 6], [2, 7], [3, 8], [4, 9],
  // inner pentagram
  [5, 7], [7, 9], [9, 6], [6, 8], [8, 5],
];

/** The Petersen graph: 3-regular, girth 5, 3-connected and not Hamiltonian */
export function petersenGraph(): Graph {
  return graphFromEdges(10, PETERSEN_EDGES);
}

export type GraphTemplate = 'complete' | 'cycle' | 'star' | 'path' | 'petersen';

export const GRAPH_TEMPLATES: readonly GraphTemplate[] = ['complete', 'cycle', 'star', 'path', 'petersen'];

/** Build a named template; `n` is ignored for petersen */
export function buildTemplate(template: GraphTemplate, n: number): Graph {
  switch (template) {
    case 'complete':
      return completeGraph(n);
    case 'cycle':
      return cycleGraph(n);
    case 'star':
      return starGraph(n);
    case 'path':
      return pathGraph(n);
    case 'petersen':
      return petersenGraph();
  }
}
