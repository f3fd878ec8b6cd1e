/**
 * System tools - server diagnostics
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { enabledToolNames, ALL_CATEGORIES, type ServerConfig } from '../core/config.js';
import { MAX_LIMIT, SERVER_NAME, SERVER_VERSION } from '../core/constants.js';
import type { GraphRegistry } from '../core/graphRegistry.js';
import { LOG_COMPONENTS, LOG_LEVELS, getServerLog } from '../core/serverLog.js';
import { jsonResult } from '../core/toolResult.js';

/**
 * Register system/diagnostic tools
 */
export function registerSystemTools(server: McpServer, registry: GraphRegistry, config: ServerConfig): void {
  server.registerTool(
    'server_log',
    {
      title: 'Server Log',
      description:
        'Recent server activity: startup, configuration warnings and one entry per tool call. ' +
        'Filter by component, minimum level or timestamp (ms since epoch).',
      inputSchema: {
        since: z.coerce.number().optional().describe('Only entries newer than this timestamp (ms)'),
        component: z.enum(LOG_COMPONENTS).optional().describe('Only entries from this component'),
        level: z.enum(LOG_LEVELS).optional().describe('Lowest level to include (warn returns warnings and errors)'),
        limit: z.coerce.number().int().min(1).max(MAX_LIMIT).default(50).describe('Maximum entries to return'),
      },
    },
    async ({ since, component, level, limit }) => {
      const { entries, server_uptime_ms } = getServerLog({ since, component, level, limit });
      return jsonResult({
        server_uptime_ms,
        count: entries.length,
        entries: entries.map(e => ({ ...e, time: new Date(e.ts).toISOString() })),
      });
    }
  );

  server.registerTool(
    'server_config',
    {
      title: 'Server Config',
      description: 'Effective server configuration: enabled tool categories and tools, limits, data directory.',
      inputSchema: {},
    },
    async () =>
      jsonResult({
        server: { name: SERVER_NAME, version: SERVER_VERSION },
        categories: ALL_CATEGORIES.filter(c => config.categories.has(c)),
        tools: enabledToolNames(config.categories),
        default_exact: config.defaultExact,
        max_vertices: config.maxVertices,
        max_graphs: config.maxGraphs,
        graphs_held: registry.size,
        data_dir: config.dataDir,
      })
  );
}
