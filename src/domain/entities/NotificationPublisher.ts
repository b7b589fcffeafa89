/**
 * Notification Publisher
 *
 * Publisher with two events: `notify`, typed by a custom handler
 * signature, and `standardNotify`, using the standard
 * `(sender, args)` shape.
 *
 * @module domain/entities/NotificationPublisher
 */

import { EventArgs, type EventHandler } from '../events/EventArgs';
import { EventSlot, type IEvent } from '../events/EventSlot';
import type { ILogger } from '@/infrastructure/interfaces/ILogger';

/**
 * Handler signature of the `notify` event.
 */
export type NotifyEventHandler = (message: string) => void;

export class NotificationPublisher {
  private readonly notifySlot: EventSlot<Parameters<NotifyEventHandler>>;
  private readonly standardNotifySlot: EventSlot<Parameters<EventHandler<NotificationPublisher>>>;

  /** Raised with a message by {@link raiseNotify} */
  readonly notify: IEvent<Parameters<NotifyEventHandler>>;

  /** Raised with {@link EventArgs.Empty} by {@link raiseStandardNotify} */
  readonly standardNotify: IEvent<Parameters<EventHandler<NotificationPublisher>>>;

  constructor(logger?: ILogger) {
    this.notifySlot = new EventSlot('Notify', logger);
    this.standardNotifySlot = new EventSlot('StandardNotify', logger);
    this.notify = this.notifySlot.asEvent();
    this.standardNotify = this.standardNotifySlot.asEvent();
  }

  /**
   * Raises `notify`. No-op without subscribers.
   */
  raiseNotify(message: string): void {
    this.notifySlot.raise(message);
  }

  /**
   * Raises `standardNotify` with this publisher as sender. No-op without
   * subscribers.
   */
  raiseStandardNotify(): void {
    this.standardNotifySlot.raise(this, EventArgs.Empty);
  }

  get notifySubscriberCount(): number {
    return this.notifySlot.subscriberCount;
  }

  get standardNotifySubscriberCount(): number {
    return this.standardNotifySlot.subscriberCount;
  }
}
