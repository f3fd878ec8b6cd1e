/**
 * Network tools - validator topology reports
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { analyzeNetwork, type NetworkTopology } from '@zagreb-graph/core';
import type { ServerConfig } from '../core/config.js';
import { MAX_LIMIT } from '../core/constants.js';
import { loadTopology, saveReport, TopologySchema } from '../core/networkStore.js';
import { serverLog } from '../core/serverLog.js';
import { runTool } from '../core/toolResult.js';

/**
 * Register network analysis tools
 */
export function registerNetworkTools(server: McpServer, config: ServerConfig): void {
  server.registerTool(
    'network_analyze',
    {
      title: 'Analyze Validator Network',
      description:
        'Analyze a validator network topology: connectivity level, traversal class, efficiency ' +
        'ratio, lowest-connectivity validators, stake bottlenecks and recommendations. ' +
        'Pass either `file` (a JSON topology under the data directory) or an inline `topology`. ' +
        '`save_to` writes the report as JSON under the data directory.\n\n' +
        'Example: network_analyze({ file: "topology.json", limit: 10, save_to: "reports/latest.json" })',
      inputSchema: {
        file: z.string().optional().describe('Topology JSON path relative to the data directory'),
        topology: TopologySchema.optional().describe('Inline topology { validators, connections }'),
        exact: z.boolean().optional().describe('Use exact (Menger) connectivity instead of the heuristic'),
        limit: z.coerce.number().int().min(1).max(MAX_LIMIT).default(5).describe('Entries per report list'),
        save_to: z.string().optional().describe('Report path relative to the data directory'),
      },
    },
    async ({ file, topology, exact, limit, save_to }) =>
      runTool('network', 'network_analyze', { source: file ?? 'inline' }, async () => {
        let data: NetworkTopology;
        if (file !== undefined && topology === undefined) {
          data = await loadTopology(config.dataDir, file);
        } else if (topology !== undefined && file === undefined) {
          data = topology;
        } else {
          throw new Error('Provide exactly one of file or topology');
        }

        if (data.validators.length > config.maxVertices) {
          throw new Error(
            `Topology has ${data.validators.length} validators, above the limit of ${config.maxVertices}`
          );
        }

        const report = analyzeNetwork(data, { exact: exact ?? config.defaultExact, limit });

        let savedTo: string | undefined;
        if (save_to !== undefined) {
          savedTo = await saveReport(config.dataDir, save_to, report);
          serverLog('network', `Report saved to ${savedTo}`);
        }

        return {
          source: file ?? 'inline',
          validator_count: data.validators.length,
          report,
          saved_to: savedTo,
        };
      })
  );
}
