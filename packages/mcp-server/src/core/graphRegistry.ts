/**
 * Named graphs held by a server session
 *
 * Lookups fail fast with an Error naming the graph, so tool handlers can
 * call `require()` and let the SDK report the failure.
 */

import type { Graph } from '@zagreb-graph/core';
import { GRAPH_NAME_PATTERN } from './constants.js';

export interface GraphRecord {
  name: string;
  graph: Graph;
  /** Template the graph was built from, or 'custom' */
  source: string;
  createdAt: number;
}

export interface GraphSummary {
  name: string;
  source: string;
  vertex_count: number;
  edge_count: number;
  created_at: string;
}

export class GraphRegistry {
  private readonly graphs = new Map<string, GraphRecord>();

  constructor(
    readonly maxGraphs: number,
    readonly maxVertices: number,
  ) {}

  get size(): number {
    return this.graphs.size;
  }

  /**
   * @throws Error if the vertex count exceeds the configured limit
   */
  checkVertexCount(n: number): void {
    if (n > this.maxVertices) {
      throw new Error(`Vertex count ${n} exceeds the limit of ${this.maxVertices}`);
    }
  }

  /**
   * Register a graph under a new name.
   *
   * @throws Error on an invalid or taken name, or when the registry is full
   */
  add(name: string, graph: Graph, source: string): GraphRecord {
    if (!GRAPH_NAME_PATTERN.test(name)) {
      throw new Error(`Invalid graph name "${name}": use 1-64 letters, digits, '.', '_' or '-'`);
    }
    if (this.graphs.has(name)) {
      throw new Error(`Graph "${name}" already exists`);
    }
    if (this.graphs.size >= this.maxGraphs) {
      throw new Error(`Graph limit reached (${this.maxGraphs}); delete a graph first`);
    }
    this.checkVertexCount(graph.vertexCount());

    const record: GraphRecord = { name, graph, source, createdAt: Date.now() };
    this.graphs.set(name, record);
    return record;
  }

  has(name: string): boolean {
    return this.graphs.has(name);
  }

  /**
   * @throws Error if no graph has this name
   */
  require(name: string): GraphRecord {
    const record = this.graphs.get(name);
    if (!record) {
      throw new Error(`Graph "${name}" not found`);
    }
    return record;
  }

  delete(name: string): boolean {
    return this.graphs.delete(name);
  }

  list(): GraphSummary[] {
    return [...this.graphs.values()].map(record => ({
      name: record.name,
      source: record.source,
      vertex_count: record.graph.vertexCount(),
      edge_count: record.graph.edgeCount(),
      created_at: new Date(record.createdAt).toISOString(),
    }));
  }
}
