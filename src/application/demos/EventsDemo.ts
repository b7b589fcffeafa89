/**
 * Events Demo
 *
 * Subscribes a bound method and lambdas to a publisher's events, raises
 * them, then unsubscribes and raises again with nobody listening.
 *
 * @module application/demos/EventsDemo
 */

import { injectable, inject } from 'tsyringe';
import type { ILogger } from '@/infrastructure/interfaces/ILogger';
import type { IOutput } from '@/infrastructure/interfaces/IOutput';
import { Delegate } from '@/domain/delegates/Delegate';
import { NotificationPublisher } from '@/domain/entities/NotificationPublisher';
import type { Demo } from './Demo';

@injectable()
export class EventsDemo implements Demo {
  readonly name = 'events' as const;

  constructor(
    @inject('IOutput') private readonly output: IOutput,
    @inject('ILogger') private readonly logger: ILogger
  ) {}

  run(): void {
    this.logger.info('Running events demo');

    const publisher = new NotificationPublisher(this.logger);

    // Named handler, bound to this demo
    publisher.notify.add(new Delegate(this.onNotifyReceived, this));

    const unsubscribeLambda = publisher.notify.add((message) =>
      this.output.writeLine(`Lambda received: ${message}`)
    );

    publisher.standardNotify.add(() => {
      this.output.writeLine('StandardNotify event triggered.');
    });

    publisher.raiseNotify('Hello from custom event!');
    publisher.raiseStandardNotify();

    // An equal delegate removes the earlier registration
    publisher.notify.remove(new Delegate(this.onNotifyReceived, this));
    unsubscribeLambda();

    publisher.raiseNotify('Nobody is listening');
    this.output.writeLine(`Subscribers after unsubscribe: ${publisher.notifySubscriberCount}`);
  }

  private onNotifyReceived(message: string): void {
    this.output.writeLine(`Named handler received: ${message}`);
  }
}
