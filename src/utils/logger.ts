import type { LogLevel } from '../types/Config.js';

// stdout belongs to the MCP stdio transport, so every line goes to stderr
const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export type LogFormat = 'text' | 'json';

interface LoggerSettings {
  level: LogLevel;
  format: LogFormat;
}

const settings: LoggerSettings = {
  level: parseLevel(process.env.RECALL_LOG_LEVEL) ?? 'info',
  format: process.env.RECALL_LOG_FORMAT === 'json' ? 'json' : 'text',
};

export function parseLevel(value: string | undefined): LogLevel | undefined {
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') return value;
  return undefined;
}

export function configureLogging(opts: Partial<LoggerSettings>): void {
  if (opts.level) settings.level = opts.level;
  if (opts.format) settings.format = opts.format;
}

function write(level: LogLevel, scope: string, message: string, data?: Record<string, unknown>): void {
  if (LEVELS[level] < LEVELS[settings.level]) return;
  const timestamp = new Date().toISOString();
  if (settings.format === 'json') {
    console.error(JSON.stringify({ level, scope, message, ...(data ? { data } : {}), timestamp }));
    return;
  }
  const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : '';
  console.error(`[Recall] ${timestamp} ${level.toUpperCase()} ${scope}: ${message}${suffix}`);
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, data) => write('debug', scope, message, data),
    info: (message, data) => write('info', scope, message, data),
    warn: (message, data) => write('warn', scope, message, data),
    error: (message, data) => write('error', scope, message, data),
  };
}
