/**
 * Shared constants for the Zagreb MCP server
 */

export const SERVER_NAME = 'zagreb-graph';

export const SERVER_VERSION = '0.1.0';

/** Maximum results per request to prevent massive response payloads */
export const MAX_LIMIT = 200;

export const DEFAULT_MAX_VERTICES = 5000;

export const DEFAULT_MAX_GRAPHS = 64;

/** Graph names double as identifiers in tool arguments */
export const GRAPH_NAME_PATTERN = /^[A-Za-z0-9_.-]{1,64}$/;
