/**
 * Scoped console logging with a level gate.
 * Recent entries are kept in memory and read back with recent().
 *
 * Usage:
 *   const log = createLogger('nutrition-route');
 *   log.info('Evaluated product', { barcode: '3000000000001' });
 *   log.error('Evaluation failed', { error: err.message });
 */

import { cfg, LogLevel } from '../config.js';

export interface LogEntry {
  ts: number;      // timestamp
  level: LogLevel;
  scope: string;
  msg: string;
  data?: unknown;
}

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const MAX_RECENT = 200;
const recentEntries: LogEntry[] = [];

function write(entry: LogEntry): void {
  const line = `[${entry.scope}] ${entry.msg}`;
  const args = entry.data === undefined ? [line] : [line, JSON.stringify(entry.data)];
  if (entry.level === 'error') console.error(...args);
  else if (entry.level === 'warn') console.warn(...args);
  else console.log(...args);
}

export function createLogger(scope: string, options?: { level?: LogLevel }): Logger {
  const minRank = LEVEL_RANK[options?.level ?? cfg.logLevel];

  const emit = (level: LogLevel, msg: string, data?: unknown) => {
    if (LEVEL_RANK[level] < minRank) return;
    const entry: LogEntry = { ts: Date.now(), level, scope, msg };
    if (data !== undefined) entry.data = data;
    recentEntries.push(entry);
    if (recentEntries.length > MAX_RECENT) recentEntries.splice(0, recentEntries.length - MAX_RECENT);
    write(entry);
  };

  return {
    debug: (msg, data) => emit('debug', msg, data),
    info: (msg, data) => emit('info', msg, data),
    warn: (msg, data) => emit('warn', msg, data),
    error: (msg, data) => emit('error', msg, data),
  };
}

// Newest last
export function recent(limit = 50): LogEntry[] {
  return recentEntries.slice(-limit);
}

export function clearRecent(): void {
  recentEntries.length = 0;
}
