import { describe, it, expect } from 'vitest';
import {
  Delegate,
  EventArgs,
  EventSlot,
  MulticastDelegate,
  NotificationPublisher,
  add,
  multiply,
} from '@/index';

describe('public API', () => {
  it('should combine exported operations into a multicast delegate', () => {
    const math = MulticastDelegate.of(add, new Delegate(multiply));

    expect(math?.length).toBe(2);
    expect(math?.invoke(4, 5)).toBe(20);
  });

  it('should expose publisher events that accept exported slot listeners', () => {
    const publisher = new NotificationPublisher();
    const received: string[] = [];
    const slot = new EventSlot<[message: string]>('Relay');

    slot.add((message) => received.push(`relay: ${message}`));
    publisher.notify.add((message) => slot.raise(message));
    publisher.raiseNotify('ping');

    expect(received).toEqual(['relay: ping']);
    expect(EventArgs.Empty).toBeInstanceOf(EventArgs);
  });
});
