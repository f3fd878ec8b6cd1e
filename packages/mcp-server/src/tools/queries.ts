/**
 * Query tools - run engine operations and analysis reports on named graphs
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  DEFAULT_MAX_CONNECTIVITY,
  analyzeGraph,
  averageDegree,
  classifyTraversal,
  connectivityLevel,
  zagrebEfficiency,
  zagrebThresholds,
  type Graph,
} from '@zagreb-graph/core';
import type { GraphRegistry } from '../core/graphRegistry.js';
import type { ServerConfig } from '../core/config.js';
import { runTool } from '../core/toolResult.js';

export const QUERY_OPERATIONS = [
  'vertex_count',
  'edge_count',
  'degree',
  'neighbors',
  'has_edge',
  'edges',
  'min_degree',
  'max_degree',
  'first_zagreb_index',
  'is_complete',
  'is_cycle',
  'is_path',
  'is_star',
  'is_petersen',
  'is_connected',
  'find_path',
  'is_path_between',
  'find_vertex_disjoint_paths',
  'is_k_connected',
  'is_k_connected_approx',
  'is_k_connected_exact',
  'independent_set_approx',
  'independence_number_approx',
  'is_likely_hamiltonian',
  'is_likely_traceable',
  'zagreb_upper_bound',
] as const;

export type QueryOperation = typeof QUERY_OPERATIONS[number];

export interface QueryArgs {
  u?: number;
  v?: number;
  k?: number;
  exact: boolean;
}

/** Largest connectivity level graph_analyze will probe */
const MAX_PROBE_K = 10;

function requireArg(value: number | undefined, arg: string, operation: QueryOperation): number {
  if (value === undefined) {
    throw new Error(`Operation ${operation} requires argument ${arg}`);
  }
  return value;
}

/**
 * Run one engine operation. Each operation maps onto exactly one Graph method.
 *
 * @throws Error if a required argument is missing
 * @throws GraphError from the engine on invalid vertices
 */
export function runQuery(graph: Graph, operation: QueryOperation, args: QueryArgs): unknown {
  const { u, v, k, exact } = args;

  switch (operation) {
    case 'vertex_count':
      return graph.vertexCount();
    case 'edge_count':
      return graph.edgeCount();
    case 'degree':
      return graph.degree(requireArg(v, 'v', operation));
    case 'neighbors':
      return [...graph.neighbors(requireArg(v, 'v', operation))];
    case 'has_edge':
      return graph.hasEdge(requireArg(u, 'u', operation), requireArg(v, 'v', operation));
    case 'edges':
      return graph.edges();
    case 'min_degree':
      return graph.minDegree();
    case 'max_degree':
      return graph.maxDegree();
    case 'first_zagreb_index':
      return graph.firstZagrebIndex();
    case 'is_complete':
      return graph.isComplete();
    case 'is_cycle':
      return graph.isCycle();
    case 'is_path':
      return graph.isPath();
    case 'is_star':
      return graph.isStar();
    case 'is_petersen':
      return graph.isPetersen();
    case 'is_connected':
      return graph.isConnected();
    case 'find_path':
      return graph.findPath(requireArg(u, 'u', operation), requireArg(v, 'v', operation));
    case 'is_path_between':
      return graph.isPathBetween(requireArg(u, 'u', operation), requireArg(v, 'v', operation));
    case 'find_vertex_disjoint_paths':
      return graph.findVertexDisjointPaths(requireArg(u, 'u', operation), requireArg(v, 'v', operation));
    case 'is_k_connected':
      return graph.isKConnected(requireArg(k, 'k', operation), exact);
    case 'is_k_connected_approx':
      return graph.isKConnectedApprox(requireArg(k, 'k', operation));
    case 'is_k_connected_exact':
      return graph.isKConnectedExact(requireArg(k, 'k', operation));
    case 'independent_set_approx':
      return graph.independentSetApprox();
    case 'independence_number_approx':
      return graph.independenceNumberApprox();
    case 'is_likely_hamiltonian':
      return graph.isLikelyHamiltonian(exact);
    case 'is_likely_traceable':
      return graph.isLikelyTraceable(exact);
    case 'zagreb_upper_bound':
      return graph.zagrebUpperBound();
  }
}

/**
 * Register graph query tools
 */
export function registerQueryTools(server: McpServer, registry: GraphRegistry, config: ServerConfig): void {
  server.registerTool(
    'graph_query',
    {
      title: 'Query Graph',
      description:
        'Run one engine operation on a named graph. Vertex operations take `v` (degree, neighbors) ' +
        'or `u` and `v` (has_edge, find_path, is_path_between, find_vertex_disjoint_paths); ' +
        'connectivity operations take `k`; is_k_connected and the likely_* operations take `exact`.\n\n' +
        'Example: graph_query({ name: "p", operation: "is_k_connected", k: 3, exact: true })\n' +
        'Example: graph_query({ name: "p", operation: "find_path", u: 0, v: 7 })',
      inputSchema: {
        name: z.string().describe('Graph name'),
        operation: z.enum(QUERY_OPERATIONS).describe('Operation to run'),
        u: z.coerce.number().optional().describe('First vertex id'),
        v: z.coerce.number().optional().describe('Second (or only) vertex id'),
        k: z.coerce.number().int().optional().describe('Connectivity level'),
        exact: z.boolean().optional().describe('Use exact (Menger) connectivity instead of the heuristic'),
      },
    },
    async ({ name, operation, u, v, k, exact }) =>
      runTool('analysis', 'graph_query', { name, operation }, () => {
        const { graph } = registry.require(name);
        const useExact = exact ?? config.defaultExact;
        return {
          graph: name,
          operation,
          result: runQuery(graph, operation, { u, v, k, exact: useExact }),
        };
      })
  );

  server.registerTool(
    'graph_analyze',
    {
      title: 'Analyze Graph',
      description:
        'Full invariant report for a named graph: Zagreb index and its upper bound, degrees, ' +
        'independence number, Hamiltonicity/traceability estimates, connectivity level, ' +
        'traversal class, the Zagreb thresholds and Dirac\'s condition.',
      inputSchema: {
        name: z.string().describe('Graph name'),
        exact: z.boolean().optional().describe('Use exact (Menger) connectivity instead of the heuristic'),
        max_k: z.coerce.number().int().min(1).max(MAX_PROBE_K).default(DEFAULT_MAX_CONNECTIVITY)
          .describe('Highest connectivity level to probe'),
      },
    },
    async ({ name, exact, max_k }) =>
      runTool('analysis', 'graph_analyze', { name }, () => {
        const { graph } = registry.require(name);
        const useExact = exact ?? config.defaultExact;
        const n = graph.vertexCount();
        const diracMinDegree = Math.floor(n / 2);

        return {
          graph: name,
          exact: useExact,
          analysis: analyzeGraph(graph, { exact: useExact }),
          average_degree: averageDegree(graph),
          connectivity_level: connectivityLevel(graph, max_k, useExact),
          efficiency_ratio: zagrebEfficiency(graph),
          traversal: classifyTraversal(graph, useExact),
          thresholds: zagrebThresholds(graph),
          dirac: {
            required_min_degree: diracMinDegree,
            satisfied: n >= 3 && graph.minDegree() >= diracMinDegree,
          },
        };
      })
  );
}
