/**
 * logger.ts
 * Structured logger for the route scan pipeline.
 *
 * Use ConsoleLogger in the CLI; SilentLogger in tests or when callers
 * do not care about output. BufferedLogger keeps lines in memory and can
 * flush them to a file for --debug audits.
 *
 * Every builder and the deriver accept an optional Logger and default to
 * SilentLogger.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_LABEL: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

function formatLine(
  prefix: string,
  level: Exclude<LogLevel, 'silent'>,
  message: string,
  context?: Record<string, unknown>,
): string {
  const ts = new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
  const ctx = context !== undefined ? '  ' + JSON.stringify(context) : '';
  return `${ts} [${prefix}] [${LEVEL_LABEL[level]}] ${message}${ctx}`;
}

// ---------------------------------------------------------------------------
// Level-filtering base
// ---------------------------------------------------------------------------

abstract class LevelLogger implements Logger {
  private readonly _minLevel: number;
  protected readonly _prefix: string;

  constructor(level: LogLevel, prefix: string) {
    this._minLevel = LEVEL_ORDER[level];
    this._prefix = prefix;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this._log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this._log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this._log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this._log('error', message, context);
  }

  protected abstract _emit(level: Exclude<LogLevel, 'silent'>, line: string): void;

  private _log(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    context?: Record<string, unknown>,
  ): void {
    if (this._minLevel > LEVEL_ORDER[level]) return;
    this._emit(level, formatLine(this._prefix, level, message, context));
  }
}

// ---------------------------------------------------------------------------
// ConsoleLogger
// ---------------------------------------------------------------------------

export class ConsoleLogger extends LevelLogger {
  constructor(level: LogLevel = 'info', prefix = 'routes') {
    super(level, prefix);
  }

  protected _emit(level: Exclude<LogLevel, 'silent'>, line: string): void {
    if (level === 'error') {
      process.stderr.write(line + '\n');
    } else {
      process.stdout.write(line + '\n');
    }
  }
}

// ---------------------------------------------------------------------------
// BufferedLogger: keeps lines in memory, flushes to a file on demand
// ---------------------------------------------------------------------------

export class BufferedLogger extends LevelLogger {
  private readonly _lines: string[] = [];

  constructor(level: LogLevel = 'debug', prefix = 'routes') {
    super(level, prefix);
  }

  /** Lines logged so far, oldest first. */
  get lines(): readonly string[] {
    return this._lines;
  }

  /** Write accumulated lines to a file, creating parent directories. */
  flush(filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, this._lines.join('\n') + '\n', 'utf-8');
  }

  protected _emit(_level: Exclude<LogLevel, 'silent'>, line: string): void {
    this._lines.push(line);
  }
}

// ---------------------------------------------------------------------------
// TeeLogger: console output plus an in-memory buffer
// ---------------------------------------------------------------------------

export class TeeLogger implements Logger {
  private readonly _console: ConsoleLogger;
  private readonly _buffer: BufferedLogger;

  constructor(level: LogLevel = 'debug', prefix = 'routes') {
    this._console = new ConsoleLogger(level, prefix);
    this._buffer = new BufferedLogger(level, prefix);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this._console.debug(message, context);
    this._buffer.debug(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this._console.info(message, context);
    this._buffer.info(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this._console.warn(message, context);
    this._buffer.warn(message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this._console.error(message, context);
    this._buffer.error(message, context);
  }

  flush(filePath: string): void {
    this._buffer.flush(filePath);
  }
}

// ---------------------------------------------------------------------------
// SilentLogger: used as default when no logger is supplied
// ---------------------------------------------------------------------------

export class SilentLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}
