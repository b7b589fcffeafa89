/**
 * Leveled logger shared by the services, the demos and event slots.
 *
 * The context record carries structured fields such as the event name,
 * the handler name and the subscriber count; `ConsoleLogger` appends it
 * as JSON.
 */
export interface ILogger {
  /**
   * Slot activity: handlers added or removed, events raised.
   */
  debug(message: string, context?: Record<string, unknown>): void;

  /**
   * Progress of a run, such as which demos start and finish.
   */
  info(message: string, context?: Record<string, unknown>): void;

  /**
   * Recoverable problems, such as a configuration value replaced by its
   * default.
   */
  warn(message: string, context?: Record<string, unknown>): void;

  /**
   * Failures: a throwing event handler, a failed demo or CLI run.
   */
  error(message: string, context?: Record<string, unknown>): void;
}
