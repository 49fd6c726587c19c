/**
 * Engine Logger
 *
 * Structured logging for the flow engine.
 * Supports text, pretty and JSON output, level filtering, categories,
 * a pluggable line sink and an optional in-memory buffer of recent entries.
 *
 * @module core
 */

import { Chalk, type ChalkInstance } from 'chalk';
import {
  LogCategory,
  LogLevel,
  LogLevelSeverity,
  type ConfigLogLevel,
  type EngineLogFormat,
  type EngineLoggerConfig,
  type LogEntry,
  type LogSink,
} from '../types/log-types.js';

const defaultSink: LogSink = line => {
  console.log(line);
};

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return '"[unserializable]"';
  }
}

/**
 * Engine Logger
 */
export class EngineLogger {
  private config: Required<EngineLoggerConfig>;
  private palette: ChalkInstance;
  private readonly entries: LogEntry[] = [];

  constructor(config: EngineLoggerConfig) {
    this.config = {
      level: config.level,
      format: config.format ?? 'text',
      colors: config.colors ?? true,
      timestamp: config.timestamp ?? true,
      source: config.source ?? 'flowweave',
      category: config.category ?? LogCategory.SYSTEM,
      bufferSize: config.bufferSize ?? 0,
      sink: config.sink ?? defaultSink,
    };
    this.palette = new Chalk({ level: this.config.colors ? 1 : 0 });
  }

  debug(message: string, context?: Record<string, unknown>, category?: LogCategory): void {
    this.log(LogLevel.DEBUG, message, context, undefined, category);
  }

  info(message: string, context?: Record<string, unknown>, category?: LogCategory): void {
    this.log(LogLevel.INFO, message, context, undefined, category);
  }

  warn(message: string, context?: Record<string, unknown>, category?: LogCategory): void {
    this.log(LogLevel.WARN, message, context, undefined, category);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>, category?: LogCategory): void {
    this.log(LogLevel.ERROR, message, context, error, category);
  }

  fatal(message: string, error?: Error, context?: Record<string, unknown>, category?: LogCategory): void {
    this.log(LogLevel.FATAL, message, context, error, category);
  }

  /**
   * Check if a level will be logged
   */
  willLog(level: LogLevel): boolean {
    return this.config.level !== null && LogLevelSeverity[level] >= LogLevelSeverity[this.config.level];
  }

  setLevel(level: LogLevel | null): void {
    this.config.level = level;
  }

  setColors(enabled: boolean): void {
    this.config.colors = enabled;
    this.palette = new Chalk({ level: enabled ? 1 : 0 });
  }

  setFormat(format: EngineLogFormat): void {
    this.config.format = format;
  }

  getConfig(): Readonly<Required<EngineLoggerConfig>> {
    return { ...this.config };
  }

  /**
   * Recently logged entries (up to `bufferSize`)
   */
  getEntries(): readonly LogEntry[] {
    return [...this.entries];
  }

  clearEntries(): void {
    this.entries.length = 0;
  }

  /**
   * Render an entry in the configured format
   */
  format(entry: LogEntry): string {
    switch (this.config.format) {
      case 'json':
        return this.formatJson(entry);
      case 'pretty':
        return this.formatPretty(entry);
      case 'text':
        return this.formatText(entry);
    }
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
    category?: LogCategory
  ): void {
    if (!this.willLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      category: category ?? this.config.category,
      source: this.config.source,
      message,
      ...(context !== undefined && { context }),
      ...(error !== undefined && { error }),
    };

    if (this.config.bufferSize > 0) {
      this.entries.push(entry);
      if (this.entries.length > this.config.bufferSize) {
        this.entries.shift();
      }
    }

    this.config.sink(this.format(entry), entry);
  }

  private badge(level: LogLevel): string {
    const label = level.toUpperCase().padEnd(5);
    switch (level) {
      case LogLevel.DEBUG:
        return this.palette.gray(label);
      case LogLevel.INFO:
        return this.palette.cyan(label);
      case LogLevel.WARN:
        return this.palette.yellow(label);
      case LogLevel.ERROR:
        return this.palette.red(label);
      case LogLevel.FATAL:
        return this.palette.bgRed.white(label);
    }
  }

  private formatText(entry: LogEntry): string {
    let line = this.config.timestamp ? `${entry.timestamp.toISOString()} ` : '';
    line += `${this.badge(entry.level)} [${entry.source}:${entry.category}] ${entry.message}`;
    if (entry.context && Object.keys(entry.context).length > 0) {
      line += ` ${safeStringify(entry.context)}`;
    }
    if (entry.error) {
      line += ` - ${entry.error.message}`;
    }
    return line;
  }

  private formatPretty(entry: LogEntry): string {
    const lines: string[] = [];
    const time = this.config.timestamp ? `${this.palette.dim(entry.timestamp.toISOString())} ` : '';
    lines.push(`${time}${this.badge(entry.level)} ${this.palette.bold(entry.message)} ${this.palette.dim(`(${entry.source}:${entry.category})`)}`);

    for (const [key, value] of Object.entries(entry.context ?? {})) {
      lines.push(`  ${this.palette.gray(`${key}:`)} ${typeof value === 'string' ? value : safeStringify(value)}`);
    }

    if (entry.error) {
      lines.push(`  ${this.palette.red(`${entry.error.name}: ${entry.error.message}`)}`);
    }

    return lines.join('\n');
  }

  private formatJson(entry: LogEntry): string {
    return safeStringify({
      timestamp: entry.timestamp.toISOString(),
      level: entry.level,
      category: entry.category,
      source: entry.source,
      message: entry.message,
      context: entry.context,
      error: entry.error ? { name: entry.error.name, message: entry.error.message } : undefined,
    });
  }
}

const LEVEL_MAP: Readonly<Record<ConfigLogLevel, LogLevel | null>> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: null,
};

/**
 * Create a logger from engine config levels.
 * `silent` yields a logger that drops everything.
 */
export function createEngineLogger(
  logLevel: ConfigLogLevel,
  verbose: boolean = false,
  sink?: LogSink
): EngineLogger {
  return new EngineLogger({
    level: verbose && logLevel !== 'silent' ? LogLevel.DEBUG : LEVEL_MAP[logLevel],
    format: verbose ? 'pretty' : 'text',
    colors: true,
    timestamp: verbose,
    source: 'flowweave',
    category: LogCategory.SYSTEM,
    sink,
  });
}
