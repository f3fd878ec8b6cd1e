#!/usr/bin/env node
/**
 * Zagreb graph server - Zagreb-index graph analysis over MCP
 *
 * 9 tools across 4 categories
 * - graphs: graph_create, graph_add_edges, graph_list, graph_delete
 * - queries: graph_query (one engine operation by name), graph_analyze
 * - network: network_analyze (validator topology reports)
 * - system: server_log, server_config
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadServerConfig } from './core/config.js';
import { serverLog } from './core/serverLog.js';
import { createServer } from './server.js';

async function main() {
  serverLog('server', 'Starting Zagreb graph server...');

  const config = loadServerConfig();
  serverLog('config', `Data directory: ${config.dataDir}`);
  serverLog(
    'config',
    `Limits: ${config.maxVertices} vertices, ${config.maxGraphs} graphs; default strategy ${config.defaultExact ? 'exact' : 'approximate'}`
  );

  const { server } = createServer(config);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  serverLog('server', 'MCP server connected');
}

main().catch((error) => {
  console.error('[Zagreb] Fatal error:', error);
  process.exit(1);
});
