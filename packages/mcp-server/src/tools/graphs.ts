/**
 * Graph management tools - create, extend, list and delete named graphs
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { Graph, buildTemplate } from '@zagreb-graph/core';
import type { GraphRegistry } from '../core/graphRegistry.js';
import { runTool } from '../core/toolResult.js';

const PETERSEN_VERTICES = 10;

const EdgeListSchema = z
  .array(z.tuple([z.number(), z.number()]))
  .describe('Undirected edges as [u, v] pairs of vertex ids');

/**
 * Register graph management tools
 */
export function registerGraphTools(server: McpServer, registry: GraphRegistry): void {
  server.registerTool(
    'graph_create',
    {
      title: 'Create Graph',
      description:
        'Create a named simple undirected graph, either empty on `vertices` vertices or from a template, ' +
        'then add optional edges. Vertex ids run from 0 to vertices-1.\n\n' +
        'Example: graph_create({ name: "p", template: "petersen" })\n' +
        'Example: graph_create({ name: "g", vertices: 4, edges: [[0, 1], [1, 2], [2, 3]] })',
      inputSchema: {
        name: z.string().describe('Name to register the graph under'),
        vertices: z.coerce.number().int().nonnegative().optional().describe('Vertex count (ignored for petersen)'),
        template: z.enum(['complete', 'cycle', 'star', 'path', 'petersen']).optional().describe('Standard shape to start from'),
        edges: EdgeListSchema.optional(),
      },
    },
    async ({ name, vertices, template, edges }) =>
      runTool('graphs', 'graph_create', { name }, () => {
        if (registry.has(name)) {
          throw new Error(`Graph "${name}" already exists`);
        }

        let graph: Graph;
        if (template) {
          const n = template === 'petersen' ? PETERSEN_VERTICES : vertices;
          if (n === undefined) {
            throw new Error(`vertices is required for the ${template} template`);
          }
          registry.checkVertexCount(n);
          graph = buildTemplate(template, n);
        } else {
          if (vertices === undefined) {
            throw new Error('Provide vertices or template');
          }
          registry.checkVertexCount(vertices);
          graph = new Graph(vertices);
        }

        for (const [u, v] of edges ?? []) {
          graph.addEdge(u, v);
        }

        const record = registry.add(name, graph, template ?? 'custom');
        return {
          created: record.name,
          source: record.source,
          vertex_count: graph.vertexCount(),
          edge_count: graph.edgeCount(),
        };
      })
  );

  server.registerTool(
    'graph_add_edges',
    {
      title: 'Add Edges',
      description:
        'Add edges to a named graph. Existing edges are ignored. The whole batch is checked first; ' +
        'an invalid vertex or a self-loop rejects it and the graph is left unchanged.',
      inputSchema: {
        name: z.string().describe('Graph name'),
        edges: EdgeListSchema.min(1),
      },
    },
    async ({ name, edges }) =>
      runTool('graphs', 'graph_add_edges', { name, edges: edges.length }, () => {
        const { graph } = registry.require(name);
        const before = graph.edgeCount();

        for (const [u, v] of edges) {
          graph.checkEdge(u, v);
        }
        for (const [u, v] of edges) {
          graph.addEdge(u, v);
        }

        return {
          graph: name,
          added: graph.edgeCount() - before,
          edge_count: graph.edgeCount(),
        };
      })
  );

  server.registerTool(
    'graph_list',
    {
      title: 'List Graphs',
      description: 'List the graphs held by this session with their sizes.',
      inputSchema: {},
    },
    async () =>
      runTool('graphs', 'graph_list', {}, () => {
        const graphs = registry.list();
        return {
          count: graphs.length,
          max_graphs: registry.maxGraphs,
          graphs,
        };
      })
  );

  server.registerTool(
    'graph_delete',
    {
      title: 'Delete Graph',
      description: 'Remove a named graph from the session.',
      inputSchema: {
        name: z.string().describe('Graph name'),
      },
    },
    async ({ name }) =>
      runTool('graphs', 'graph_delete', { name }, () => {
        if (!registry.delete(name)) {
          throw new Error(`Graph "${name}" not found`);
        }
        return { deleted: name, remaining: registry.size };
      })
  );
}
