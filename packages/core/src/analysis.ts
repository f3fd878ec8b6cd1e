/**
 * Graph analysis reports
 *
 * Bundles the engine's invariants into the JSON-ready shape consumed by the
 * server and network tooling (snake_case keys).
 */

import type { Graph } from './graph.js';
import {
  HAMILTONIAN_K,
  TRACEABLE_K,
  TRACEABLE_THRESHOLD_MIN_VERTICES,
  hamiltonianThreshold,
  paramsOf,
  traceableThreshold,
} from './theorems.js';

export interface GraphAnalysisResult {
  vertex_count: number;
  edge_count: number;
  zagreb_index: number;
  min_degree: number;
  max_degree: number;
  is_likely_hamiltonian: boolean;
  is_likely_traceable: boolean;
  independence_number: number;
  zagreb_upper_bound: number;
}

export interface AnalysisOptions {
  /** Use exact (Menger) connectivity instead of the heuristic */
  exact?: boolean;
}

export type TraversalClass = 'hamiltonian' | 'traceable' | 'fragmented';

export interface ZagrebThresholds {
  /** null when the graph has fewer than 3 vertices */
  hamiltonian: number | null;
  /** null when the graph has fewer than 9 vertices (the Dirac-like test decides there) */
  traceable: number | null;
}

/** Default ceiling when probing connectivity levels */
export const DEFAULT_MAX_CONNECTIVITY = 5;

export function analyzeGraph(graph: Graph, options: AnalysisOptions = {}): GraphAnalysisResult {
  const exact = options.exact ?? false;

  return {
    vertex_count: graph.vertexCount(),
    edge_count: graph.edgeCount(),
    zagreb_index: graph.firstZagrebIndex(),
    min_degree: graph.minDegree(),
    max_degree: graph.maxDegree(),
    is_likely_hamiltonian: graph.isLikelyHamiltonian(exact),
    is_likely_traceable: graph.isLikelyTraceable(exact),
    independence_number: graph.independenceNumberApprox(),
    zagreb_upper_bound: graph.zagrebUpperBound(),
  };
}

/** 2e / n, or 0 for the empty graph */
export function averageDegree(graph: Graph): number {
  const n = graph.vertexCount();
  return n === 0 ? 0 : (2 * graph.edgeCount()) / n;
}

/** Z1 as a fraction of its upper bound */
export function zagrebEfficiency(graph: Graph): number {
  const bound = graph.zagrebUpperBound();
  return bound === 0 ? 0 : graph.firstZagrebIndex() / bound;
}

/**
 * Largest k <= maxK for which the graph is 1-, 2-, ..., k-connected.
 * Probing stops at the first level that fails.
 */
export function connectivityLevel(graph: Graph, maxK = DEFAULT_MAX_CONNECTIVITY, exact = false): number {
  let level = 0;
  for (let k = 1; k <= maxK; k++) {
    if (!graph.isKConnected(k, exact)) break;
    level = k;
  }
  return level;
}

/** Vertices whose degree is at most one above the minimum */
export function lowConnectivityVertices(graph: Graph): number[] {
  const cutoff = graph.minDegree() + 1;
  const result: number[] = [];
  for (let v = 0; v < graph.vertexCount(); v++) {
    if (graph.degree(v) <= cutoff) result.push(v);
  }
  return result;
}

export function classifyTraversal(graph: Graph, exact = false): TraversalClass {
  if (graph.isLikelyHamiltonian(exact)) return 'hamiltonian';
  if (graph.isLikelyTraceable(exact)) return 'traceable';
  return 'fragmented';
}

export function zagrebThresholds(graph: Graph): ZagrebThresholds {
  const n = graph.vertexCount();
  return {
    hamiltonian: n >= 3 ? hamiltonianThreshold(paramsOf(graph, HAMILTONIAN_K)) : null,
    traceable: n >= TRACEABLE_THRESHOLD_MIN_VERTICES
      ? traceableThreshold(paramsOf(graph, TRACEABLE_K))
      : null,
  };
}
