// src/lib/log.ts
// Console logger tagged by scope, e.g. "[design/solver] bracket widened".
import { getConfig, type LogLevel } from '@/lib/config';

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export type Logger = {
  debug: (msg: string, extra?: Record<string, unknown>) => void;
  info: (msg: string, extra?: Record<string, unknown>) => void;
  warn: (msg: string, extra?: Record<string, unknown>) => void;
  error: (msg: string, extra?: unknown) => void;
};

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return RANK[level] >= RANK[getConfig().logLevel];
}

export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    debug: (msg, extra) => { if (enabled('debug')) console.debug(tag, msg, ...(extra ? [extra] : [])); },
    info: (msg, extra) => { if (enabled('info')) console.info(tag, msg, ...(extra ? [extra] : [])); },
    warn: (msg, extra) => { if (enabled('warn')) console.warn(tag, msg, ...(extra ? [extra] : [])); },
    error: (msg, extra) => { if (enabled('error')) console.error(`${tag} ERROR:`, msg, ...(extra === undefined ? [] : [extra])); },
  };
}
