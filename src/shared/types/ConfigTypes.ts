/**
 * Shared configuration types.
 *
 * @module shared/types/ConfigTypes
 */

// ============================================================================
// Log Levels
// ============================================================================

/**
 * Log levels in ascending order of severity.
 * `silent` suppresses every message.
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

// ============================================================================
// Demo Names
// ============================================================================

/**
 * Runnable demonstrations, in their default order.
 */
export const DEMO_NAMES = ['delegates', 'multicast-failures', 'events'] as const;

export type DemoName = (typeof DEMO_NAMES)[number];

export function isDemoName(value: string): value is DemoName {
  return (DEMO_NAMES as readonly string[]).includes(value);
}

// ============================================================================
// Application Configuration
// ============================================================================

export interface AppConfig {
  /** Minimum level a log message needs to be written */
  logLevel: LogLevel;
  /** Demos to run, in order */
  demos: DemoName[];
}
