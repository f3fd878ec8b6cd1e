/**
 * @zagreb-graph/core
 *
 * Zagreb-index based invariants over simple undirected graphs.
 */

export { Graph } from './graph.js';
export {
  GraphError,
  InvalidVertexError,
  SelfLoopError,
  isGraphError,
  type GraphErrorKind,
} from './errors.js';
export {
  cloneAdjacency,
  countReachable,
  detachVertex,
  findPathInSubgraph,
  removeEdge,
  type Adjacency,
  type ReadonlyAdjacency,
} from './adjacency.js';
export {
  MAX_PATH_SEARCH_ATTEMPTS,
  checkKConnectedApprox,
  checkKConnectedExact,
  countVertexDisjointPaths,
  isKConnectedWith,
  type ConnectivityStrategy,
} from './connectivity.js';
export {
  HAMILTONIAN_K,
  TRACEABLE_K,
  TRACEABLE_THRESHOLD_MIN_VERTICES,
  greedyIndependentSet,
  hamiltonianThreshold,
  likelyHamiltonian,
  likelyTraceable,
  paramsOf,
  traceableThreshold,
  zagrebUpperBound,
  type ThresholdParams,
} from './theorems.js';
export {
  GRAPH_TEMPLATES,
  PETERSEN_EDGES,
  buildTemplate,
  completeGraph,
  cycleGraph,
  graphFromEdges,
  pathGraph,
  petersenGraph,
  starGraph,
  type GraphTemplate,
} from './builders.js';
export {
  DEFAULT_MAX_CONNECTIVITY,
  analyzeGraph,
  averageDegree,
  classifyTraversal,
  connectivityLevel,
  lowConnectivityVertices,
  zagrebEfficiency,
  zagrebThresholds,
  type AnalysisOptions,
  type GraphAnalysisResult,
  type TraversalClass,
  type ZagrebThresholds,
} from './analysis.js';
export {
  MAX_TARGET_AVG_DEGREE,
  MIN_TARGET_AVG_DEGREE,
  analyzeNetwork,
  buildTopologyGraph,
  networkRecommendations,
  stakingConcentration,
  type BottleneckScore,
  type NetworkAnalysisOptions,
  type NetworkReport,
  type NetworkTopology,
  type PeerConnections,
  type TopologyGraph,
  type ValidatorInfo,
  type ValidatorSummary,
} from './topology.js';
