/**
 * Exports for the Logger infrastructure.
 *
 * Provides access to the ILogger interface and ConsoleLogger implementation.
 */

export { ConsoleLogger, DEFAULT_LOG_LEVEL } from './ConsoleLogger';
export type { ILogger } from '../interfaces/ILogger';
