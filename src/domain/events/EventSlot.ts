/**
 * Event Slot
 *
 * A notification slot owned by a publisher. The owner keeps the
 * {@link EventSlot} private and publishes its {@link IEvent} view, so
 * subscribers can only add and remove handlers while raising stays with
 * the owner.
 *
 * Handlers are held in a {@link MulticastDelegate} and run synchronously,
 * in registration order.
 *
 * @module domain/events/EventSlot
 */

import { Delegate, type Callable } from '../delegates/Delegate';
import { MulticastDelegate, type InvocationOutcome } from '../delegates/MulticastDelegate';
import type { ILogger } from '@/infrastructure/interfaces/ILogger';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Function to unsubscribe from an event.
 *
 * Call this function to remove a previously registered handler.
 */
export type UnsubscribeFunction = () => void;

/**
 * Handler accepted by an event: a function or a delegate.
 */
export type EventListener<TArgs extends unknown[]> =
  | Callable<TArgs, void>
  | Delegate<TArgs, void>;

/**
 * Subscriber-facing view of an event.
 */
export interface IEvent<TArgs extends unknown[]> {
  /** Event name, for diagnostics */
  readonly name: string;

  /**
   * Appends a handler.
   *
   * @returns Function removing this handler again
   */
  add(handler: EventListener<TArgs>): UnsubscribeFunction;

  /**
   * Removes the most recent registration equal to `handler`.
   * Unknown handlers are ignored.
   */
  remove(handler: EventListener<TArgs>): void;
}

// ============================================================================
// Event Slot Implementation
// ============================================================================

/**
 * Owner-side notification slot.
 *
 * @example
 * ```typescript
 * class Thermostat {
 *   private readonly changedSlot = new EventSlot<[celsius: number]>('Changed');
 *   readonly changed = this.changedSlot.asEvent();
 *
 *   set(celsius: number): void {
 *     this.changedSlot.raise(celsius);
 *   }
 * }
 *
 * const unsubscribe = thermostat.changed.add((c) => console.log(c));
 * ```
 */
export class EventSlot<TArgs extends unknown[]> implements IEvent<TArgs> {
  // ==========================================================================
  // Private Fields
  // ==========================================================================

  /** Registered handlers; null while nobody is subscribed */
  private handlers: MulticastDelegate<TArgs, void> | null = null;

  /** Cached subscriber-facing view */
  private view: IEvent<TArgs> | null = null;

  // ==========================================================================
  // Constructor
  // ==========================================================================

  /**
   * @param name - Event name used in log messages
   * @param logger - Receives debug messages on add, remove and raise
   */
  constructor(
    readonly name: string,
    private readonly logger?: ILogger
  ) {}

  // ==========================================================================
  // Subscription
  // ==========================================================================

  add(handler: EventListener<TArgs>): UnsubscribeFunction {
    const delegate = Delegate.from(handler);
    this.handlers = MulticastDelegate.combine(this.handlers, delegate);

    this.logger?.debug('Handler added', {
      event: this.name,
      handler: delegate.methodName,
      subscriberCount: this.subscriberCount,
    });

    // Each returned function removes its own registration at most once
    let active = true;
    return () => {
      if (!active) {
        return;
      }
      active = false;
      this.remove(delegate);
    };
  }

  remove(handler: EventListener<TArgs>): void {
    const delegate = Delegate.from(handler);
    const before = this.handlers;
    this.handlers = MulticastDelegate.remove(this.handlers, delegate);

    if (this.handlers === before) {
      this.logger?.debug('Handler not found', { event: this.name, handler: delegate.methodName });
      return;
    }

    this.logger?.debug('Handler removed', {
      event: this.name,
      handler: delegate.methodName,
      subscriberCount: this.subscriberCount,
    });
  }

  /** Number of registered handlers. */
  get subscriberCount(): number {
    return this.handlers?.length ?? 0;
  }

  /**
   * View exposing only `name`, `add` and `remove`.
   */
  asEvent(): IEvent<TArgs> {
    if (!this.view) {
      const view: IEvent<TArgs> = {
        name: this.name,
        add: (handler) => this.add(handler),
        remove: (handler) => this.remove(handler),
      };
      this.view = Object.freeze(view);
    }
    return this.view;
  }

  // ==========================================================================
  // Raising (owner only)
  // ==========================================================================

  /**
   * Invokes every handler in registration order.
   *
   * Does nothing when there are no handlers. An error from a handler
   * propagates and the remaining handlers are not invoked.
   */
  raise(...args: TArgs): void {
    const handlers = this.handlers;
    if (!handlers) {
      this.logger?.debug('No handlers registered for event', { event: this.name });
      return;
    }

    this.logger?.debug('Raising event', { event: this.name, subscriberCount: handlers.length });
    handlers.invoke(...args);
  }

  /**
   * Invokes every handler separately; a throwing handler does not stop
   * the ones after it. Each failure is logged at error level.
   *
   * @returns One outcome per handler, empty when there are none
   */
  raiseEach(...args: TArgs): InvocationOutcome<TArgs, void>[] {
    const handlers = this.handlers;
    if (!handlers) {
      this.logger?.debug('No handlers registered for event', { event: this.name });
      return [];
    }

    const outcomes = handlers.invokeEach(...args);
    for (const outcome of outcomes) {
      if (outcome.status === 'rejected') {
        const errorMessage =
          outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
        this.logger?.error('Event handler error', {
          event: this.name,
          handler: outcome.delegate.methodName,
          error: errorMessage,
        });
      }
    }
    return outcomes;
  }
}
