/**
 * Public API: delegates, multicast invocation and events.
 */

export * from './domain/delegates';
export * from './domain/events';

export type { NotifyEventHandler } from './domain/entities/NotificationPublisher';
export { NotificationPublisher } from './domain/entities/NotificationPublisher';

export type { MathOperation } from './domain/services/ArithmeticOperations';
export { add, subtract, multiply, divide } from './domain/services/ArithmeticOperations';

export type { ILogger } from './infrastructure/interfaces/ILogger';
