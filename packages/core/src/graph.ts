/**
 * Graph - simple undirected graph with Zagreb-index based invariants
 *
 * Layers (each only calls the ones above it):
 * - adjacency store: vertex/edge counts and neighbor sets, mutated by addEdge only
 * - basic metrics: degree, min/max degree, first Zagreb index
 * - structural classifiers: complete, cycle, path, star, Petersen fingerprint
 * - connectivity: BFS reachability, path search, disjoint paths, k-connectivity
 * - theorem evaluators: Hamiltonicity, traceability, Zagreb upper bound
 *
 * Queries never mutate. Concurrent mutation is not synchronised; build the
 * graph first, then share it read-only.
 */

import {
  countReachable,
  findPathInSubgraph,
  type ReadonlyAdjacency,
} from './adjacency.js';
import {
  countVertexDisjointPaths,
  isKConnectedWith,
  checkKConnectedApprox,
  checkKConnectedExact,
} from './connectivity.js';
import { InvalidVertexError, SelfLoopError } from './errors.js';
import {
  greedyIndependentSet,
  likelyHamiltonian,
  likelyTraceable,
  zagrebUpperBound,
} from './theorems.js';

export class Graph {
  private readonly adjacency = new Map<number, Set<number>>();
  private readonly nVertices: number;
  private nEdges = 0;

  constructor(n: number) {
    if (!Number.isSafeInteger(n) || n < 0) {
      throw new RangeError(`Vertex count must be a non-negative integer, got ${n}`);
    }
    this.nVertices = n;
    for (let v = 0; v < n; v++) {
      this.adjacency.set(v, new Set());
    }
  }

  // ===========================================================================
  // Adjacency store
  // ===========================================================================

  /**
   * Add the undirected edge (u, v). Adding an edge that already exists is a no-op.
   *
   * @throws InvalidVertexError if u or v is not a vertex of this graph
   * @throws SelfLoopError if u === v
   */
  addEdge(u: number, v: number): void {
    this.checkEdge(u, v);
    const uNeighbors = this.neighborSet(u);
    const vNeighbors = this.neighborSet(v);

    if (uNeighbors.has(v)) return;

    uNeighbors.add(v);
    vNeighbors.add(u);
    this.nEdges++;
  }

  /**
   * Raise the error addEdge(u, v) would raise, without touching the graph.
   * Lets callers validate a whole batch before applying any of it.
   *
   * @throws InvalidVertexError if u or v is not a vertex of this graph
   * @throws SelfLoopError if u === v
   */
  checkEdge(u: number, v: number): void {
    this.neighborSet(u);
    this.neighborSet(v);

    if (u === v) {
      throw new SelfLoopError(u);
    }
  }

  /** @throws InvalidVertexError */
  degree(v: number): number {
    return this.neighborSet(v).size;
  }

  /** @throws InvalidVertexError */
  neighbors(v: number): ReadonlySet<number> {
    return this.neighborSet(v);
  }

  /** @throws InvalidVertexError */
  hasEdge(u: number, v: number): boolean {
    this.neighborSet(v);
    return this.neighborSet(u).has(v);
  }

  /** Each undirected edge once, as [u, v] with u < v */
  edges(): Array<[number, number]> {
    const result: Array<[number, number]> = [];
    for (const [u, neighbors] of this.adjacency) {
      for (const v of neighbors) {
        if (u < v) result.push([u, v]);
      }
    }
    return result;
  }

  /** Read-only view of the adjacency mapping */
  adjacencyView(): ReadonlyAdjacency {
    return this.adjacency;
  }

  vertexCount(): number {
    return this.nVertices;
  }

  edgeCount(): number {
    return this.nEdges;
  }

  private neighborSet(v: number): Set<number> {
    const neighbors = Number.isInteger(v) ? this.adjacency.get(v) : undefined;
    if (!neighbors) {
      throw new InvalidVertexError(v, this.nVertices);
    }
    return neighbors;
  }

  // ===========================================================================
  // Basic metrics
  // ===========================================================================

  /** Smallest vertex degree (0 for an empty graph) */
  minDegree(): number {
    if (this.nVertices === 0) return 0;
    let min = Infinity;
    for (const neighbors of this.adjacency.values()) {
      min = Math.min(min, neighbors.size);
    }
    return min;
  }

  /** Largest vertex degree (0 for an empty graph) */
  maxDegree(): number {
    let max = 0;
    for (const neighbors of this.adjacency.values()) {
      max = Math.max(max, neighbors.size);
    }
    return max;
  }

  /** Sum of squared vertex degrees */
  firstZagrebIndex(): number {
    let sum = 0;
    for (const neighbors of this.adjacency.values()) {
      sum += neighbors.size * neighbors.size;
    }
    return sum;
  }

  private countDegree(degree: number): number {
    let count = 0;
    for (const neighbors of this.adjacency.values()) {
      if (neighbors.size === degree) count++;
    }
    return count;
  }

  // ===========================================================================
  // Structural classifiers
  // ===========================================================================

  /** Every vertex adjacent to every other; trivially true for n <= 1 */
  isComplete(): boolean {
    const n = this.nVertices;
    if (n <= 1) return true;
    return this.countDegree(n - 1) === n && this.nEdges === (n * (n - 1)) / 2;
  }

  /**
   * 2-regular with as many edges as vertices. Judged from the degree sequence
   * only: a disjoint union of cycles also matches.
   */
  isCycle(): boolean {
    return this.nVertices > 0 && this.countDegree(2) === this.nVertices && this.nEdges === this.nVertices;
  }

  /**
   * n-1 edges, two vertices of degree 1 and the rest of degree 2. Judged from
   * the degree sequence only, like isCycle.
   */
  isPath(): boolean {
    const n = this.nVertices;
    if (this.nEdges !== n - 1) return false;
    return this.countDegree(1) === 2 && this.countDegree(2) === n - 2;
  }

  /** One center of degree n-1, every other vertex a leaf */
  isStar(): boolean {
    const n = this.nVertices;
    if (n <= 1) return false;
    return this.countDegree(1) === n - 1 && this.countDegree(n - 1) === 1;
  }

  /**
   * Petersen fingerprint: 10 vertices, 15 edges, 3-regular, no triangle and no
   * 4-cycle. Any cubic graph of girth >= 5 on 10 vertices matches; this is not
   * an isomorphism test.
   */
  isPetersen(): boolean {
    if (this.nVertices !== 10 || this.nEdges !== 15) return false;
    if (this.minDegree() !== 3 || this.maxDegree() !== 3) return false;
    return !this.hasTriangle() && !this.hasSquare();
  }

  private hasTriangle(): boolean {
    for (const [, uNeighbors] of this.adjacency) {
      for (const v of uNeighbors) {
        for (const w of uNeighbors) {
          if (v !== w && this.neighborSet(v).has(w)) return true;
        }
      }
    }
    return false;
  }

  private hasSquare(): boolean {
    for (const [u, uNeighbors] of this.adjacency) {
      for (const v of uNeighbors) {
        for (const w of this.neighborSet(v)) {
          if (w === u) continue;
          for (const x of this.neighborSet(w)) {
            if (x !== v && x !== u && this.neighborSet(x).has(u)) return true;
          }
        }
      }
    }
    return false;
  }

  // ===========================================================================
  // Connectivity
  // ===========================================================================

  /** BFS from vertex 0 reaches every vertex; true for n = 0 */
  isConnected(): boolean {
    if (this.nVertices === 0) return true;
    return countReachable(this.adjacency, 0) === this.nVertices;
  }

  /**
   * Shortest path from s to t over this graph's own edges.
   *
   * @throws InvalidVertexError
   */
  findPath(s: number, t: number): number[] | null {
    this.neighborSet(s);
    this.neighborSet(t);
    return findPathInSubgraph(this.adjacency, s, t);
  }

  /** @throws InvalidVertexError */
  isPathBetween(s: number, t: number): boolean {
    return this.findPath(s, t) !== null;
  }

  /**
   * Greedy estimate of the number of internally vertex-disjoint s-t paths.
   *
   * @throws InvalidVertexError
   */
  findVertexDisjointPaths(s: number, t: number): number {
    this.neighborSet(s);
    this.neighborSet(t);
    return countVertexDisjointPaths(this, s, t);
  }

  /**
   * k-connectivity through the chosen strategy. Complete graphs are answered
   * directly (k <= n-1) before either strategy runs.
   */
  isKConnected(k: number, exact = false): boolean {
    return isKConnectedWith(this, k, exact ? 'exact' : 'approximate');
  }

  /** Density / Zagreb-ratio heuristic; fast, may disagree with the exact check */
  isKConnectedApprox(k: number): boolean {
    return checkKConnectedApprox(this, k);
  }

  /** Menger's theorem: every vertex pair joined by at least k disjoint paths */
  isKConnectedExact(k: number): boolean {
    return checkKConnectedExact(this, k);
  }

  // ===========================================================================
  // Theorem evaluators
  // ===========================================================================

  /** Greedy independent set: repeatedly take a vertex of minimum remaining degree */
  independentSetApprox(): number[] {
    return greedyIndependentSet(this);
  }

  independenceNumberApprox(): number {
    return greedyIndependentSet(this).length;
  }

  isLikelyHamiltonian(exact = false): boolean {
    return likelyHamiltonian(this, exact);
  }

  isLikelyTraceable(exact = false): boolean {
    return likelyTraceable(this, exact);
  }

  zagrebUpperBound(): number {
    return zagrebUpperBound(this);
  }
}
