import { LogCategory, LogLevel, type EngineLoggerConfig } from '../types/log-types.js';
import { EngineLogger } from '../core/EngineLogger.js';

/**
 * Singleton Logger Manager
 *
 * Provides centralized access to an EngineLogger for components that are
 * constructed without one (stores, event buses, mocks).
 *
 * Usage:
 * ```typescript
 * // In the embedding application
 * LoggerManager.initialize({ level: LogLevel.INFO, format: 'json' });
 *
 * // Anywhere else
 * const logger = LoggerManager.getLogger();
 * logger.warn('Variable overwritten', { name: 'score' });
 * ```
 */
export class LoggerManager {
  private static instance: EngineLogger | null = null;

  /**
   * Initialize the shared logger. A second call keeps the first instance.
   */
  static initialize(config: EngineLoggerConfig): EngineLogger {
    if (this.instance) {
      this.instance.warn('LoggerManager already initialized; keeping the existing logger');
      return this.instance;
    }

    this.instance = new EngineLogger({
      format: 'text',
      colors: true,
      timestamp: true,
      source: 'flowweave',
      category: LogCategory.SYSTEM,
      ...config,
    });

    this.instance.debug('LoggerManager initialized', {
      level: config.level,
      format: config.format ?? 'text',
    });

    return this.instance;
  }

  /**
   * Shared logger; created at warn level on first use when never initialized
   */
  static getLogger(): EngineLogger {
    if (!this.instance) {
      this.instance = new EngineLogger({ level: LogLevel.WARN, format: 'text', source: 'flowweave' });
    }
    return this.instance;
  }

  static isReady(): boolean {
    return this.instance !== null;
  }

  /**
   * Drop the shared logger (tests)
   */
  static reset(): void {
    this.instance = null;
  }
}
