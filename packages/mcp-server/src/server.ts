/**
 * Server assembly - builds an McpServer with the tools of the enabled categories
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ALL_CATEGORIES, enabledToolNames, type ServerConfig, type ToolCategory } from './core/config.js';
import { SERVER_NAME, SERVER_VERSION } from './core/constants.js';
import { GraphRegistry } from './core/graphRegistry.js';
import { serverLog } from './core/serverLog.js';
import { registerGraphTools } from './tools/graphs.js';
import { registerQueryTools } from './tools/queries.js';
import { registerNetworkTools } from './tools/network.js';
import { registerSystemTools } from './tools/system.js';

export interface ServerContext {
  server: McpServer;
  registry: GraphRegistry;
  config: ServerConfig;
}

export function createServer(config: ServerConfig): ServerContext {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });
  const registry = new GraphRegistry(config.maxGraphs, config.maxVertices);

  const registrars: Record<ToolCategory, () => void> = {
    graphs: () => registerGraphTools(server, registry),
    queries: () => registerQueryTools(server, registry, config),
    network: () => registerNetworkTools(server, config),
    system: () => registerSystemTools(server, registry, config),
  };

  const enabled = ALL_CATEGORIES.filter(c => config.categories.has(c));
  for (const category of enabled) {
    registrars[category]();
  }

  serverLog('server', `Tool categories: ${enabled.join(', ')}`);
  serverLog('server', `Registered ${enabledToolNames(config.categories).length} tools`);

  return { server, registry, config };
}

export { loadServerConfig, parseEnabledCategories, type ServerConfig, type ToolCategory } from './core/config.js';
export { GraphRegistry } from './core/graphRegistry.js';
export { getServerLog, serverLog } from './core/serverLog.js';
