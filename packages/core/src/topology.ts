/**
 * Validator network topology analysis
 *
 * Turns persisted validator/peer data into a Graph and derives resilience
 * indicators: connectivity level, traversal class, stake-weighted
 * bottlenecks and improvement advice.
 */

import {
  analyzeGraph,
  averageDegree,
  classifyTraversal,
  connectivityLevel,
  lowConnectivityVertices,
  zagrebEfficiency,
  type GraphAnalysisResult,
  type TraversalClass,
} from './analysis.js';
import { Graph } from './graph.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ValidatorInfo {
  id: number;
  pubkey: string;
  vote_account: string;
  stake: number;
  name?: string | null;
}

export interface PeerConnections {
  id: number;
  peers: number[];
}

export interface NetworkTopology {
  validators: ValidatorInfo[];
  connections: PeerConnections[];
}

export interface TopologyGraph {
  graph: Graph;
  /** Vertex index -> validator */
  validators: ValidatorInfo[];
  /** Peer references to ids that are not validators */
  unknown_peers: number;
}

export interface ValidatorSummary {
  id: number;
  name: string;
  pubkey: string;
  connections: number;
}

export interface BottleneckScore extends ValidatorSummary {
  score: number;
}

export interface NetworkReport {
  analysis: GraphAnalysisResult;
  average_degree: number;
  connectivity_level: number;
  efficiency_ratio: number;
  traversal: TraversalClass;
  unknown_peers: number;
  low_connectivity: ValidatorSummary[];
  bottlenecks: BottleneckScore[];
  recommendations: string[];
}

export interface NetworkAnalysisOptions {
  exact?: boolean;
  /** Entries per list in the report (default 5) */
  limit?: number;
}

/** Average degree below this asks for more connections */
export const MIN_TARGET_AVG_DEGREE = 5;

/** Average degree above this flags overhead */
export const MAX_TARGET_AVG_DEGREE = 15;

const DEFAULT_REPORT_LIMIT = 5;

// =============================================================================
// GRAPH CONSTRUCTION
// =============================================================================

/**
 * Build the validator graph: vertex i is the i-th validator, and every
 * (id, peer) pair between two distinct known validators becomes an edge.
 *
 * @throws Error on duplicate validator ids
 */
export function buildTopologyGraph(topology: NetworkTopology): TopologyGraph {
  const vertexById = new Map<number, number>();
  topology.validators.forEach((validator, index) => {
    if (vertexById.has(validator.id)) {
      throw new Error(`Duplicate validator id ${validator.id}`);
    }
    vertexById.set(validator.id, index);
  });

  const graph = new Graph(topology.validators.length);
  let unknownPeers = 0;

  for (const { id, peers } of topology.connections) {
    const vertex = vertexById.get(id);
    if (vertex === undefined) continue;

    for (const peer of peers) {
      const peerVertex = vertexById.get(peer);
      if (peerVertex === undefined) {
        unknownPeers++;
        continue;
      }
      if (peerVertex !== vertex) {
        graph.addEdge(vertex, peerVertex);
      }
    }
  }

  return { graph, validators: topology.validators, unknown_peers: unknownPeers };
}

// =============================================================================
// INDICATORS
// =============================================================================

function summarize(validator: ValidatorInfo, connections: number): ValidatorSummary {
  return {
    id: validator.id,
    name: validator.name ?? 'Unknown',
    pubkey: validator.pubkey.slice(0, 8),
    connections,
  };
}

/**
 * Stake share divided by connection share, highest first. High scores mark
 * validators holding a lot of stake behind few links. Validators without
 * links are skipped.
 */
export function stakingConcentration({ graph, validators }: TopologyGraph): BottleneckScore[] {
  const totalStake = validators.reduce((sum, v) => sum + v.stake, 0);
  if (totalStake <= 0) return [];

  const scores: BottleneckScore[] = [];
  validators.forEach((validator, vertex) => {
    const degree = graph.degree(vertex);
    if (degree === 0) return;

    const stakeShare = validator.stake / totalStake;
    const connectionShare = degree / validators.length;
    scores.push({ ...summarize(validator, degree), score: stakeShare / connectionShare });
  });

  return scores.sort((a, b) => b.score - a.score);
}

export function networkRecommendations(graph: Graph, exact = false): string[] {
  const recommendations: string[] = [];

  if (!graph.isKConnected(2, exact)) {
    recommendations.push('Add redundant connections to ensure the network is 2-connected');
  }

  const avg = averageDegree(graph);
  if (avg < MIN_TARGET_AVG_DEGREE) {
    recommendations.push(
      `Increase overall connectivity (target: at least ${MIN_TARGET_AVG_DEGREE} connections per validator)`
    );
  } else if (avg > MAX_TARGET_AVG_DEGREE) {
    recommendations.push('The network may have excessive connections, which could increase overhead');
  }

  if (!graph.isLikelyHamiltonian(exact)) {
    recommendations.push('Improve connectivity to support efficient leader rotation');
  }

  return recommendations;
}

export function analyzeNetwork(topology: NetworkTopology, options: NetworkAnalysisOptions = {}): NetworkReport {
  const exact = options.exact ?? false;
  const limit = options.limit ?? DEFAULT_REPORT_LIMIT;

  const built = buildTopologyGraph(topology);
  const { graph, validators } = built;

  return {
    analysis: analyzeGraph(graph, { exact }),
    average_degree: averageDegree(graph),
    connectivity_level: connectivityLevel(graph, undefined, exact),
    efficiency_ratio: zagrebEfficiency(graph),
    traversal: classifyTraversal(graph, exact),
    unknown_peers: built.unknown_peers,
    low_connectivity: lowConnectivityVertices(graph)
      .slice(0, limit)
      .map(vertex => summarize(validators[vertex], graph.degree(vertex))),
    bottlenecks: stakingConcentration(built).slice(0, limit),
    recommendations: networkRecommendations(graph, exact),
  };
}
