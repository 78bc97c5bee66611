/**
 * Generation log: in-memory ring buffer mirrored to stderr
 *
 * stdout carries the MCP transport, so nothing here may print to it.
 * The buffer backs the `server_log` tool.
 */

export type LogLevel = 'info' | 'warn' | 'error';

export type LogComponent =
  | 'server' | 'config' | 'topics'
  | 'graph' | 'content' | 'vault';

export interface LogEntry {
  ts: number;
  component: LogComponent;
  message: string;
  level: LogLevel;
}

export interface LogQuery {
  /** Only entries strictly newer than this timestamp (ms) */
  since?: number;
  component?: LogComponent;
  level?: LogLevel;
  limit?: number;
}

export interface LogSnapshot {
  entries: LogEntry[];
  counts: Record<LogLevel, number>;
  server_uptime_ms: number;
}

const MAX_ENTRIES = 200;
const PREFIX: Record<LogLevel, string> = {
  info: '[VaultWeave]',
  warn: '[VaultWeave] WARN',
  error: '[VaultWeave] ERROR',
};

const entries: LogEntry[] = [];
const startedAt = Date.now();

export function serverLog(component: LogComponent, message: string, level: LogLevel = 'info'): void {
  entries.push({ ts: Date.now(), component, message, level });
  if (entries.length > MAX_ENTRIES) {
    entries.splice(0, entries.length - MAX_ENTRIES);
  }
  console.error(`${PREFIX[level]} [${component}] ${message}`);
}

/**
 * Buffered entries matching every given filter, newest last, plus
 * per-level counts over the matches before the limit is applied.
 */
export function getServerLog(query: LogQuery = {}): LogSnapshot {
  const { since, component, level, limit = 100 } = query;

  const matches = entries.filter(entry =>
    (since === undefined || entry.ts > since) &&
    (component === undefined || entry.component === component) &&
    (level === undefined || entry.level === level)
  );

  const counts: Record<LogLevel, number> = { info: 0, warn: 0, error: 0 };
  for (const entry of matches) {
    counts[entry.level]++;
  }

  return {
    entries: limit > 0 ? matches.slice(-limit) : [],
    counts,
    server_uptime_ms: Date.now() - startedAt,
  };
}

/** Drop every buffered entry */
export function clearServerLog(): void {
  entries.length = 0;
}
