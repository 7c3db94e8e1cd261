/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * dxfio Logger - console-backed logging shared by every package
 *
 * Levels, most to least severe: error, warn, info, debug.
 * error and warn are always printed. info and debug need DXF_DEBUG=true,
 * or DXF_LOG_LEVEL set to 'info' or 'debug'. DXF_LOG_LEVEL=error silences
 * warnings as well.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogContext {
  /** Component/module name (e.g., 'TagReader', 'RecordDecoder') */
  component: string;
  /** Operation being performed (e.g., 'decode', 'encode') */
  operation?: string;
  /** Record handle, printed in hex */
  handle?: number;
  /** Record type name (e.g., 'LTYPE') */
  entityType?: string;
  /** Line number in the source stream */
  line?: number;
  /** Printed after the message */
  data?: Record<string, unknown>;
}

export interface Logger {
  error(message: string, error?: unknown, ctx?: Partial<LogContext>): void;
  warn(message: string, ctx?: Partial<LogContext>): void;
  info(message: string, ctx?: Partial<LogContext>): void;
  debug(message: string, data?: unknown, ctx?: Partial<LogContext>): void;
  /** An error that was handled; printed at debug level */
  caught(message: string, error: unknown, ctx?: Partial<LogContext>): void;
}

const SEVERITY: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

const WRITERS: Record<LogLevel, (...args: unknown[]) => void> = {
  error: (...args) => console.error(...args),
  warn: (...args) => console.warn(...args),
  info: (...args) => console.log(...args),
  debug: (...args) => console.debug(...args),
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(SEVERITY, value);
}

/** Read on every call so tests and long-running tools can change it */
function currentLevel(): LogLevel {
  const configured = process.env.DXF_LOG_LEVEL?.toLowerCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  return process.env.DXF_DEBUG === 'true' ? 'debug' : 'warn';
}

function prefix(ctx: LogContext): string {
  const parts = [`[${ctx.component}]`];
  if (ctx.operation) parts.push(ctx.operation);
  if (ctx.handle !== undefined) parts.push(`#${ctx.handle.toString(16)}`);
  if (ctx.entityType) parts.push(`(${ctx.entityType})`);
  if (ctx.line !== undefined) parts.push(`line ${ctx.line}`);
  return parts.join(' ');
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}${error.stack ? `\n${error.stack}` : ''}`;
  }
  return String(error);
}

/**
 * Create a logger instance for a specific component
 */
export function createLogger(component: string): Logger {
  const emit = (level: LogLevel, message: string, ctx: Partial<LogContext> | undefined, extra: unknown[]): void => {
    if (SEVERITY[level] > SEVERITY[currentLevel()]) return;
    const args: unknown[] = [`${prefix({ component, ...ctx })} ${message}`, ...extra];
    if (ctx?.data !== undefined) {
      args.push(ctx.data);
    }
    WRITERS[level](...args);
  };

  return {
    error(message, error, ctx) {
      emit('error', error === undefined ? message : `${message}:`, ctx, error === undefined ? [] : [describeError(error)]);
    },
    warn(message, ctx) {
      emit('warn', message, ctx, []);
    },
    info(message, ctx) {
      emit('info', message, ctx, []);
    },
    debug(message, data, ctx) {
      emit('debug', message, ctx, data === undefined ? [] : [data]);
    },
    caught(message, error, ctx) {
      emit('debug', `${message} (recovered):`, ctx, [describeError(error)]);
    },
  };
}
