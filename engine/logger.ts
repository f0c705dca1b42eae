// engine/logger.ts
// Single-line JSON logging through console, one object per event:
//   { level, service, event, ...ctx }

import type { LogLevel } from './config';

export type LogContext = Record<string, unknown>;

export interface ImportLogger {
  debug(event: string, ctx?: LogContext): void;
  info(event: string, ctx?: LogContext): void;
  warn(event: string, ctx?: LogContext): void;
  error(event: string, ctx?: LogContext): void;
}

export interface ImportLoggerOptions {
  service?: string;
  level?: LogLevel;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function createImportLogger(options: ImportLoggerOptions = {}): ImportLogger {
  const service = options.service ?? 'manifest-import';
  const minRank = LEVEL_RANK[options.level ?? 'info'];

  const write = (level: LogLevel, event: string, ctx: LogContext = {}) => {
    if (LEVEL_RANK[level] < minRank) return;
    const line = JSON.stringify({ level, service, event, ...ctx });
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else if (level === 'debug') console.debug(line);
    else console.info(line);
  };

  return {
    debug: (event, ctx) => write('debug', event, ctx),
    info: (event, ctx) => write('info', event, ctx),
    warn: (event, ctx) => write('warn', event, ctx),
    error: (event, ctx) => write('error', event, ctx)
  };
}
