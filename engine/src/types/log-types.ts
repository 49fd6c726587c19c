/**
 * Log levels, categories and logger configuration.
 *
 * @module types
 */

/**
 * Log levels in increasing severity
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal',
}

/**
 * Numeric severity used for level filtering
 */
export const LogLevelSeverity: Readonly<Record<LogLevel, number>> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.FATAL]: 50,
};

/**
 * Level names accepted in engine configuration.
 * `silent` drops every entry.
 */
export type ConfigLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Log categories (phase-based, not feature-based)
 *
 * - 'system': Engine lifecycle, configuration, collaborators
 * - 'analysis': Parsing, validation, template instantiation
 * - 'runtime': Run execution (nodes, retries, completion, failures)
 *
 * Never add feature or business domain categories here.
 */
export enum LogCategory {
  SYSTEM = 'system',
  ANALYSIS = 'analysis',
  RUNTIME = 'runtime',
}

export type EngineLogFormat = 'pretty' | 'text' | 'json';

/**
 * A single structured log entry
 */
export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  category: LogCategory;
  source: string;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * Receives formatted lines
 */
export type LogSink = (line: string, entry: LogEntry) => void;

/**
 * Engine logger configuration
 */
export interface EngineLoggerConfig {
  /** Minimum log level to output; `null` silences the logger */
  level: LogLevel | null;
  format?: EngineLogFormat;
  colors?: boolean;
  timestamp?: boolean;
  /** Source identifier printed with every entry */
  source?: string;
  /** Default category when a call does not pass one */
  category?: LogCategory;
  /** Number of recent entries retained for `getEntries()` (0 disables) */
  bufferSize?: number;
  sink?: LogSink;
}
