/**
 * Console-based implementation of the ILogger interface.
 *
 * This logger outputs messages to the Node.js console with appropriate
 * log levels and includes optional context information. It uses TSyringe for
 * dependency injection support.
 */

import { injectable } from 'tsyringe';
import type { ILogger } from '../interfaces/ILogger';
import { LOG_LEVELS, type LogLevel } from '@/shared/types/ConfigTypes';

/** Level applied until configuration has been loaded */
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/**
 * ConsoleLogger implementation.
 *
 * @remarks
 * Messages are formatted with a [LOG] prefix to distinguish them from
 * demonstration output. Messages below the current level are dropped.
 */
@injectable()
export class ConsoleLogger implements ILogger {
  private level: LogLevel = DEFAULT_LOG_LEVEL;

  /**
   * Change the minimum level written from now on.
   *
   * @param level - New minimum level
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Format a log message with optional context.
   *
   * @param message - The message to format
   * @param context - Optional context object with additional metadata
   * @returns Formatted message string
   */
  private formatMessage(message: string, context?: Record<string, unknown>): string {
    if (!context || Object.keys(context).length === 0) {
      return `[LOG] ${message}`;
    }
    return `[LOG] ${message} ${JSON.stringify(context)}`;
  }

  private isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.isEnabled('debug')) {
      console.debug(this.formatMessage(message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.isEnabled('info')) {
      console.info(this.formatMessage(message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.isEnabled('warn')) {
      console.warn(this.formatMessage(message, context));
    }
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this.isEnabled('error')) {
      console.error(this.formatMessage(message, context));
    }
  }
}
