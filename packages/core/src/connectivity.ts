/**
 * Vertex connectivity
 *
 * Two k-connectivity strategies behind one entry point:
 * - approximate: degree, density and Zagreb-ratio heuristics (fast, uncertified)
 * - exact: Menger's theorem over every vertex pair, using greedy disjoint-path counting
 *
 * The strategies may disagree on some graphs. That is expected; callers pick
 * the precision/speed trade-off explicitly.
 */

import {
  cloneAdjacency,
  detachVertex,
  findPathInSubgraph,
  removeEdge,
  type Adjacency,
} from './adjacency.js';
import type { Graph } from './graph.js';

export type ConnectivityStrategy = 'approximate' | 'exact';

/** Upper bound on path searches in one disjoint-path count */
export const MAX_PATH_SEARCH_ATTEMPTS = 100;

// =============================================================================
// Disjoint paths
// =============================================================================

/**
 * Repeatedly find a shortest s-t path in the working copy and detach its
 * internal vertices so later searches cannot reuse them.
 *
 * Stops when no path remains, when `limit` paths have been found, or after
 * MAX_PATH_SEARCH_ATTEMPTS removals.
 */
function extractDisjointPaths(working: Adjacency, s: number, t: number, limit: number): number {
  let pathCount = 0;
  let attempts = 0;

  for (let path = findPathInSubgraph(working, s, t); path; path = findPathInSubgraph(working, s, t)) {
    pathCount++;

    if (pathCount >= limit || attempts >= MAX_PATH_SEARCH_ATTEMPTS) break;
    attempts++;

    for (const v of path.slice(1, -1)) {
      detachVertex(working, v);
    }
  }

  return pathCount;
}

/**
 * Greedy count of internally vertex-disjoint paths between s and t.
 *
 * Complete graphs give n-1, cycles 2, and a path graph between its two end
 * vertices (0 and n-1) gives 1. Otherwise, when s and t are adjacent the
 * direct edge counts as one path and the search continues without it.
 * No augmenting-path backtracking is done, so the count can fall short of the
 * true maximum on general graphs.
 */
export function countVertexDisjointPaths(graph: Graph, s: number, t: number): number {
  if (s === t) return 0;

  const n = graph.vertexCount();

  if (graph.isComplete()) return n - 1;
  if (graph.isCycle()) return 2;
  if (graph.isPath() && ((s === 0 && t === n - 1) || (t === 0 && s === n - 1))) {
    return 1;
  }

  const working = cloneAdjacency(graph.adjacencyView());
  const maxPossiblePaths = Math.min(graph.degree(s), graph.degree(t));

  if (graph.hasEdge(s, t)) {
    removeEdge(working, s, t);
    return 1 + extractDisjointPaths(working, s, t, maxPossiblePaths - 1);
  }

  return extractDisjointPaths(working, s, t, maxPossiblePaths);
}

// =============================================================================
// k-connectivity strategies
// =============================================================================

/**
 * Checks shared by both strategies. Returns a verdict, or null when the
 * strategy has to decide.
 */
function precheck(graph: Graph, k: number): boolean | null {
  // n - 1 is -1 for the empty graph, so nothing is k-connected there
  if (k > graph.vertexCount() - 1) return false;
  // Every graph is 0-connected, including edgeless ones where Z1 / e is undefined
  if (k <= 0) return true;
  if (graph.minDegree() < k) return false;
  return null;
}

/**
 * Heuristic k-connectivity.
 *
 * After the shape shortcuts, a graph with at least (n-1)k/2 + 1 edges counts
 * as k-connected; below that, it does when Z1 / e >= k * average degree.
 */
export function checkKConnectedApprox(graph: Graph, k: number): boolean {
  const verdict = precheck(graph, k);
  if (verdict !== null) return verdict;

  const n = graph.vertexCount();
  const e = graph.edgeCount();

  if (k === 1) return graph.isConnected();
  if (graph.isComplete()) return k <= n - 1;
  if (graph.isCycle()) return k <= 2;
  if (graph.isPath()) return k <= 1;
  if (graph.isStar()) return k <= 1;

  const densityThreshold = Math.floor(((n - 1) * k) / 2) + 1;
  if (e >= densityThreshold) return true;

  const averageDegree = (2 * e) / n;
  return graph.firstZagrebIndex() / e >= k * averageDegree;
}

/**
 * Exact k-connectivity by Menger's theorem: every pair of distinct vertices
 * must be joined by at least k vertex-disjoint paths. O(n^2) pair checks,
 * each running several BFS passes; meant for small and medium graphs.
 */
export function checkKConnectedExact(graph: Graph, k: number): boolean {
  const verdict = precheck(graph, k);
  if (verdict !== null) return verdict;

  const n = graph.vertexCount();

  if (graph.isComplete()) return k <= n - 1;
  if (k === 1) return graph.isConnected();

  for (let s = 0; s < n; s++) {
    for (let t = s + 1; t < n; t++) {
      if (countVertexDisjointPaths(graph, s, t) < k) return false;
    }
  }

  return true;
}

const STRATEGIES: Record<ConnectivityStrategy, (graph: Graph, k: number) => boolean> = {
  approximate: checkKConnectedApprox,
  exact: checkKConnectedExact,
};

/**
 * Entry point for k-connectivity. Complete graphs are answered before
 * dispatching, so both strategies agree on them.
 */
export function isKConnectedWith(graph: Graph, k: number, strategy: ConnectivityStrategy): boolean {
  if (graph.isComplete()) return k <= graph.vertexCount() - 1;
  return STRATEGIES[strategy](graph, k);
}
