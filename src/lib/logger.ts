/**
 * Structured Logger
 * One JSON object per line; bound context is merged into every entry.
 */

import type { LogLevel } from './config.js';

export interface LogContext {
  requestId?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  requestId?: string;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
  child(context: LogContext): Logger;
}

export type LogSink = (level: LogLevel, line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export class JsonLogger implements Logger {
  constructor(
    private readonly level: LogLevel = 'info',
    private readonly bound: LogContext = {},
    private readonly sink: LogSink = consoleSink
  ) {}

  child(context: LogContext): Logger {
    return new JsonLogger(this.level, { ...this.bound, ...context }, this.sink);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.write('error', message, context, error);
  }

  private write(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: unknown
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const merged: LogContext = { ...this.bound, ...context };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };
    if (merged.requestId !== undefined) {
      entry.requestId = merged.requestId;
    }
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }

    if (error instanceof Error) {
      entry.error = { name: error.name, message: error.message };
      if (error.stack !== undefined) {
        entry.error.stack = error.stack;
      }
    } else if (error !== undefined && error !== null) {
      entry.error = { name: 'Unknown', message: String(error) };
    }

    this.sink(level, JSON.stringify(entry));
  }
}

function envLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL;
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') {
    return raw;
  }
  return process.env.NODE_ENV === 'test' ? 'error' : 'info';
}

export const logger: Logger = new JsonLogger(envLevel());
