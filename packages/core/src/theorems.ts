/**
 * Theorem evaluators
 *
 * Hamiltonicity and traceability are classified from sufficient conditions
 * (Dirac's theorem and Zagreb-index thresholds) plus recognition of a few
 * known shapes. A "likely" answer is heuristic: false negatives relative to
 * true Hamiltonicity are possible.
 */

import type { Graph } from './graph.js';

/** Graph parameters the threshold formulas are evaluated on */
export interface ThresholdParams {
  /** Vertex count */
  n: number;
  /** Connectivity the theorem assumes */
  k: number;
  /** Edge count */
  edges: number;
  minDegree: number;
  maxDegree: number;
}

/** Connectivity assumed by the Hamiltonicity theorem */
export const HAMILTONIAN_K = 2;

/** Connectivity assumed by the traceability theorem */
export const TRACEABLE_K = 1;

/** Smallest graph the traceability threshold applies to */
export const TRACEABLE_THRESHOLD_MIN_VERTICES = 9;

export function paramsOf(graph: Graph, k: number): ThresholdParams {
  return {
    n: graph.vertexCount(),
    k,
    edges: graph.edgeCount(),
    minDegree: graph.minDegree(),
    maxDegree: graph.maxDegree(),
  };
}

/**
 * (m)·Δ² + ⌊e²/(k+c)⌋ + ⌊(√m − √δ)²·e⌋ with m = n − k − c.
 * Integer arithmetic except the square-root term, truncated after scaling by e.
 */
function zagrebThreshold({ n, k, edges, minDegree, maxDegree }: ThresholdParams, c: number): number {
  const m = n - k - c;
  if (m < 0) {
    throw new RangeError(`Threshold undefined for n=${n}, k=${k}: n - k - ${c} is negative`);
  }

  const part1 = m * maxDegree * maxDegree;
  const part2 = Math.floor((edges * edges) / (k + c));
  const root = Math.sqrt(m) - Math.sqrt(minDegree);
  const part3 = Math.floor(root * root * edges);

  return part1 + part2 + part3;
}

/** Z1 at or above this value (with k-connectivity) suggests a Hamiltonian cycle */
export function hamiltonianThreshold(params: ThresholdParams): number {
  return zagrebThreshold(params, 1);
}

/** Z1 at or above this value (with k-connectivity) suggests a Hamiltonian path */
export function traceableThreshold(params: ThresholdParams): number {
  return zagrebThreshold(params, 2);
}

// =============================================================================
// Independence number
// =============================================================================

/**
 * Greedy independent set by minimum remaining degree. Ties go to the lowest
 * vertex id. Not a maximum independent set in general.
 */
export function greedyIndependentSet(graph: Graph): number[] {
  const remaining = new Set<number>();
  for (let v = 0; v < graph.vertexCount(); v++) remaining.add(v);

  const independent: number[] = [];

  while (remaining.size > 0) {
    let chosen = -1;
    let chosenDegree = Infinity;

    for (let v = 0; v < graph.vertexCount(); v++) {
      if (!remaining.has(v)) continue;
      let degree = 0;
      for (const u of graph.neighbors(v)) {
        if (remaining.has(u)) degree++;
      }
      if (degree < chosenDegree) {
        chosen = v;
        chosenDegree = degree;
      }
    }

    independent.push(chosen);
    remaining.delete(chosen);
    for (const neighbor of graph.neighbors(chosen)) {
      remaining.delete(neighbor);
    }
  }

  return independent;
}

// =============================================================================
// Hamiltonicity / traceability
// =============================================================================

export function likelyHamiltonian(graph: Graph, exact: boolean): boolean {
  const n = graph.vertexCount();
  if (n < 3) return false;

  if (graph.isComplete()) return true;
  if (graph.isCycle()) return true;
  if (graph.isStar() && n > 3) return false;
  if (graph.isPetersen()) return false;

  if (!graph.isKConnected(HAMILTONIAN_K, exact)) return false;

  // Dirac
  if (graph.minDegree() >= Math.floor(n / 2)) return true;

  return graph.firstZagrebIndex() >= hamiltonianThreshold(paramsOf(graph, HAMILTONIAN_K));
}

export function likelyTraceable(graph: Graph, exact: boolean): boolean {
  const n = graph.vertexCount();
  if (n < 2) return false;

  if (likelyHamiltonian(graph, exact)) return true;
  if (graph.isComplete() || graph.isPath() || graph.isStar()) return true;
  // Petersen has a Hamiltonian path
  if (graph.isPetersen()) return true;

  if (!graph.isKConnected(TRACEABLE_K, exact)) return false;

  const diracLike = graph.minDegree() >= Math.floor((n - 1) / 2);
  if (diracLike || n < TRACEABLE_THRESHOLD_MIN_VERTICES) return diracLike;

  return graph.firstZagrebIndex() >= traceableThreshold(paramsOf(graph, TRACEABLE_K));
}

// =============================================================================
// Upper bound
// =============================================================================

/**
 * (n − β)·Δ² + e²/β + (√(n − β) − √δ)²·e in floating point, with β the greedy
 * independence number. Returns 0 for the empty graph.
 */
export function zagrebUpperBound(graph: Graph): number {
  const n = graph.vertexCount();
  if (n === 0) return 0;

  const beta = graph.independenceNumberApprox();
  const e = graph.edgeCount();
  const maxDegree = graph.maxDegree();
  const root = Math.sqrt(n - beta) - Math.sqrt(graph.minDegree());

  return (n - beta) * maxDegree * maxDegree + (e * e) / beta + root * root * e;
}
