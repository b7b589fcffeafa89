/**
 * Event Arguments
 *
 * Base type for the standard `(sender, args)` event handler shape.
 *
 * @module domain/events/EventArgs
 */

/**
 * Base class for event data. Events that carry no data pass
 * {@link EventArgs.Empty}.
 */
export class EventArgs {
  /** Shared instance for events without data */
  static readonly Empty: EventArgs = new EventArgs();
}

/**
 * Standard event handler: the object that raised the event, and its data.
 */
export type EventHandler<TSender, TEventArgs extends EventArgs = EventArgs> = (
  sender: TSender,
  args: TEventArgs
) => void;
