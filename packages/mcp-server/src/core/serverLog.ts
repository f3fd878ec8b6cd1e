/**
 * Server activity log
 *
 * Every entry lands in a bounded in-memory buffer and is mirrored to stderr,
 * since stdout carries the MCP stdio protocol. The `server_log` tool reads
 * the buffer back through getServerLog().
 */

export const LOG_COMPONENTS = ['server', 'config', 'graphs', 'analysis', 'network'] as const;

export type LogComponent = typeof LOG_COMPONENTS[number];

export const LOG_LEVELS = ['info', 'warn', 'error'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

const LEVEL_SEVERITY: Record<LogLevel, number> = { info: 0, warn: 1, error: 2 };

const LEVEL_PREFIX: Record<LogLevel, string> = {
  info: '[Zagreb]',
  warn: '[Zagreb] WARN',
  error: '[Zagreb] ERROR',
};

export interface LogEntry {
  ts: number;
  component: LogComponent;
  message: string;
  level: LogLevel;
}

export interface ServerLogQuery {
  /** Only entries strictly newer than this timestamp (ms) */
  since?: number;
  /** One component, or several */
  component?: LogComponent | readonly LogComponent[];
  /** Lowest level to include: 'warn' returns warnings and errors */
  level?: LogLevel;
  limit?: number;
}

export interface ServerLogSnapshot {
  entries: LogEntry[];
  server_uptime_ms: number;
}

export const MAX_LOG_ENTRIES = 200;
const DEFAULT_QUERY_LIMIT = 100;

const buffer: LogEntry[] = [];
const serverStartTs = Date.now();

export function formatLogLine(entry: Pick<LogEntry, 'component' | 'message' | 'level'>): string {
  return `${LEVEL_PREFIX[entry.level]} [${entry.component}] ${entry.message}`;
}

export function serverLog(component: LogComponent, message: string, level: LogLevel = 'info'): void {
  const entry: LogEntry = { ts: Date.now(), component, message, level };

  buffer.push(entry);
  if (buffer.length > MAX_LOG_ENTRIES) {
    buffer.splice(0, buffer.length - MAX_LOG_ENTRIES);
  }

  console.error(formatLogLine(entry));
}

function componentFilter(component: ServerLogQuery['component']): (entry: LogEntry) => boolean {
  if (component === undefined) return () => true;
  if (typeof component === 'string') return entry => entry.component === component;

  const wanted: ReadonlySet<LogComponent> = new Set(component);
  return entry => wanted.has(entry.component);
}

/**
 * Newest matching entries, oldest first, at most `limit` of them
 */
export function getServerLog(query: ServerLogQuery = {}): ServerLogSnapshot {
  const { since, component, level, limit = DEFAULT_QUERY_LIMIT } = query;
  const matchesComponent = componentFilter(component);
  const minSeverity = level === undefined ? 0 : LEVEL_SEVERITY[level];

  const entries = buffer.filter(entry =>
    (since === undefined || entry.ts > since) &&
    matchesComponent(entry) &&
    LEVEL_SEVERITY[entry.level] >= minSeverity
  );

  return {
    entries: entries.slice(Math.max(0, entries.length - limit)),
    server_uptime_ms: Date.now() - serverStartTs,
  };
}
