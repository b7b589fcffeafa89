import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Delegate } from '@/domain/delegates/Delegate';
import { EventSlot } from '@/domain/events/EventSlot';
import type { ILogger } from '@/infrastructure/interfaces/ILogger';
import { createMockLogger } from '../test-helpers';

describe('EventSlot', () => {
  let slot: EventSlot<[message: string]>;
  let received: string[];

  beforeEach(() => {
    slot = new EventSlot('Notify');
    received = [];
  });

  describe('raise', () => {
    it('should be a no-op with zero subscribers', () => {
      expect(() => slot.raise('nobody')).not.toThrow();
      expect(slot.subscriberCount).toBe(0);
    });

    it.each([1, 2, 5])('should invoke each of %i subscribers once, in order', (count) => {
      for (let i = 0; i < count; i++) {
        slot.add((message) => received.push(`${i}:${message}`));
      }

      slot.raise('hi');

      expect(received).toEqual(Array.from({ length: count }, (_, i) => `${i}:hi`));
    });

    it('should stop at the first throwing handler', () => {
      slot.add((message) => received.push(`A:${message}`));
      slot.add(() => {
        throw new Error('B failed');
      });
      slot.add((message) => received.push(`C:${message}`));

      expect(() => slot.raise('x')).toThrow('B failed');
      expect(received).toEqual(['A:x']);
    });

    it('should finish the current raise when a handler unsubscribes another mid-raise', () => {
      let unsubscribeSecond = (): void => {};
      slot.add((message) => {
        received.push(`first:${message}`);
        unsubscribeSecond();
      });
      unsubscribeSecond = slot.add((message) => received.push(`second:${message}`));

      slot.raise('one');
      slot.raise('two');

      expect(received).toEqual(['first:one', 'second:one', 'first:two']);
    });

    it('should run later handlers when a handler unsubscribes itself mid-raise', () => {
      let unsubscribeSelf = (): void => {};
      slot.add((message) => received.push(`first:${message}`));
      unsubscribeSelf = slot.add((message) => {
        received.push(`self:${message}`);
        unsubscribeSelf();
      });
      slot.add((message) => received.push(`third:${message}`));

      slot.raise('one');
      slot.raise('two');

      expect(received).toEqual(['first:one', 'self:one', 'third:one', 'first:two', 'third:two']);
      expect(slot.subscriberCount).toBe(2);
    });

    it('should not call handlers added during a raise until the next raise', () => {
      slot.add((message) => {
        received.push(`outer:${message}`);
        slot.add((inner) => received.push(`inner:${inner}`));
      });

      slot.raise('one');

      expect(received).toEqual(['outer:one']);
      expect(slot.subscriberCount).toBe(2);
    });
  });

  describe('raiseEach', () => {
    it('should return an empty list with zero subscribers', () => {
      expect(slot.raiseEach('nobody')).toEqual([]);
    });

    it('should keep invoking after a failing handler and log the failure', () => {
      const logger = createMockLogger();
      const logged = new EventSlot<[message: string]>('Notify', logger);
      logged.add((message) => received.push(`A:${message}`));
      logged.add(function failing() {
        throw new Error('B failed');
      });
      logged.add((message) => received.push(`C:${message}`));

      const outcomes = logged.raiseEach('x');

      expect(received).toEqual(['A:x', 'C:x']);
      expect(outcomes.map((outcome) => outcome.status)).toEqual([
        'fulfilled',
        'rejected',
        'fulfilled',
      ]);
      expect(logger.error).toHaveBeenCalledTimes(1);
      expect(logger.error).toHaveBeenCalledWith('Event handler error', {
        event: 'Notify',
        handler: 'failing',
        error: 'B failed',
      });
    });
  });

  describe('add and remove', () => {
    it('should remove a function handler by identity', () => {
      const handler = (message: string): void => {
        received.push(message);
      };
      slot.add(handler);

      slot.remove(handler);
      slot.raise('gone');

      expect(received).toEqual([]);
      expect(slot.subscriberCount).toBe(0);
    });

    it('should remove only the most recent registration of a handler', () => {
      const handler = (message: string): void => {
        received.push(message);
      };
      slot.add(handler);
      slot.add(handler);

      slot.remove(handler);
      slot.raise('once');

      expect(received).toEqual(['once']);
    });

    it('should remove a bound method through an equal delegate', () => {
      class Listener {
        readonly seen: string[] = [];
        onMessage(message: string): void {
          this.seen.push(message);
        }
      }
      const listener = new Listener();
      slot.add(new Delegate(listener.onMessage, listener));

      slot.raise('first');
      slot.remove(new Delegate(listener.onMessage, listener));
      slot.raise('second');

      expect(listener.seen).toEqual(['first']);
    });

    it('should ignore removal of an unknown handler', () => {
      slot.add((message) => received.push(message));

      slot.remove(() => {});
      slot.raise('still here');

      expect(received).toEqual(['still here']);
    });

    it('should unsubscribe through the returned function', () => {
      const unsubscribe = slot.add((message) => received.push(message));

      unsubscribe();
      slot.raise('gone');

      expect(received).toEqual([]);
    });

    it('should ignore repeated calls to the same unsubscribe function', () => {
      const handler = (message: string): void => {
        received.push(message);
      };
      const unsubscribeFirst = slot.add(handler);
      slot.add(handler);

      unsubscribeFirst();
      unsubscribeFirst();
      slot.raise('x');

      expect(slot.subscriberCount).toBe(1);
      expect(received).toEqual(['x']);
    });
  });

  describe('asEvent', () => {
    it('should expose only name, add and remove', () => {
      const event = slot.asEvent();

      expect(Object.keys(event).sort()).toEqual(['add', 'name', 'remove']);
      expect(event.name).toBe('Notify');
      expect('raise' in event).toBe(false);
    });

    it('should register handlers on the owning slot', () => {
      const event = slot.asEvent();
      event.add((message) => received.push(message));

      slot.raise('via view');

      expect(received).toEqual(['via view']);
    });

    it('should return the same frozen view every time', () => {
      const event = slot.asEvent();

      expect(slot.asEvent()).toBe(event);
      expect(Object.isFrozen(event)).toBe(true);
    });
  });

  describe('logging', () => {
    let logger: ILogger;

    beforeEach(() => {
      logger = createMockLogger();
    });

    it('should log add, raise and remove at debug level', () => {
      const logged = new EventSlot<[message: string]>('Notify', logger);
      function onNotify(): void {}

      logged.add(onNotify);
      logged.raise('x');
      logged.remove(onNotify);

      expect(logger.debug).toHaveBeenNthCalledWith(1, 'Handler added', {
        event: 'Notify',
        handler: 'onNotify',
        subscriberCount: 1,
      });
      expect(logger.debug).toHaveBeenNthCalledWith(2, 'Raising event', {
        event: 'Notify',
        subscriberCount: 1,
      });
      expect(logger.debug).toHaveBeenNthCalledWith(3, 'Handler removed', {
        event: 'Notify',
        handler: 'onNotify',
        subscriberCount: 0,
      });
    });

    it('should log an empty raise', () => {
      const logged = new EventSlot<[]>('Empty', logger);

      logged.raise();

      expect(logger.debug).toHaveBeenCalledWith('No handlers registered for event', {
        event: 'Empty',
      });
    });

    it('should not require a logger', () => {
      const spy = vi.spyOn(console, 'debug');

      slot.add(() => {});
      slot.raise('x');

      expect(spy).not.toHaveBeenCalled();
      spy.mockRestore();
    });
  });
});
