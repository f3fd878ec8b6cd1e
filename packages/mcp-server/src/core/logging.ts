/**
 * Operation logging for tool invocations
 *
 * Usage in tools:
 *   import { logOperation } from '../core/logging.js';
 *
 *   logOperation('graphs', 'graph_create', true, Date.now() - startTime, {
 *     name: 'petersen',
 *   });
 */

import { serverLog, type LogComponent } from './serverLog.js';

/**
 * Record one tool invocation in the server log
 *
 * @param component - Log component the tool belongs to
 * @param tool - Tool name (e.g., 'graph_query')
 * @param success - Whether the operation succeeded
 * @param durationMs - Duration in milliseconds
 * @param details - Optional additional details, serialized as JSON
 */
export function logOperation(
  component: LogComponent,
  tool: string,
  success: boolean,
  durationMs: number,
  details?: Record<string, unknown>
): void {
  const suffix = details && Object.keys(details).length > 0 ? ` ${JSON.stringify(details)}` : '';
  serverLog(
    component,
    `${tool} ${success ? 'ok' : 'failed'} in ${durationMs}ms${suffix}`,
    success ? 'info' : 'warn'
  );
}
