/**
 * Tool result helpers
 *
 * Every handler answers with a single JSON text block. Graph errors become
 * `isError` results carrying `{ error, kind }`; anything else is rethrown for
 * the SDK to report.
 */

import { isGraphError } from '@zagreb-graph/core';
import { logOperation } from './logging.js';
import type { LogComponent } from './serverLog.js';

export type TextToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export function jsonResult(payload: unknown): TextToolResult {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(payload, null, 2) }],
  };
}

export function errorResult(payload: Record<string, unknown>): TextToolResult {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(payload) }],
    isError: true,
  };
}

/**
 * Run a tool body with timing and operation logging
 *
 * @param details - Extra fields for the log entry (e.g., the graph name)
 */
export async function runTool(
  component: LogComponent,
  tool: string,
  details: Record<string, unknown>,
  body: () => unknown
): Promise<TextToolResult> {
  const startTime = Date.now();

  try {
    const payload = await body();
    logOperation(component, tool, true, Date.now() - startTime, details);
    return jsonResult(payload);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logOperation(component, tool, false, Date.now() - startTime, { ...details, error: message });

    if (isGraphError(err)) {
      return errorResult({ error: err.message, kind: err.kind });
    }
    throw err;
  }
}
