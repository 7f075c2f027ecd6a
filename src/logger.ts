// Console-backed implementation of the adapter Logger interface

import type { Logger, LogLevel } from './types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

type EmitLevel = Exclude<LogLevel, 'silent'>;

export type LogSink = (level: EmitLevel, line: string) => void;

export interface LoggerOptions {
  component?: string;
  level?: LogLevel;
  /** Emit one JSON object per line instead of text. */
  json?: boolean;
  sink?: LogSink;
  now?: () => Date;
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const component = options.component ?? 'agent-api-adapter';
  const minLevel = LEVEL_ORDER[options.level ?? 'info'];
  const sink = options.sink ?? consoleSink;
  const now = options.now ?? (() => new Date());

  const emit = (level: EmitLevel, message: string, meta?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < minLevel) return;

    const ts = now().toISOString();
    if (options.json) {
      const entry: Record<string, unknown> = { ts, level, component, msg: message };
      if (meta) entry.meta = meta;
      sink(level, JSON.stringify(entry));
      return;
    }

    const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]`;
    sink(level, meta ? `${prefix} ${message} ${JSON.stringify(meta)}` : `${prefix} ${message}`);
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta)
  };
}

export const defaultLogger: Logger = createLogger();
