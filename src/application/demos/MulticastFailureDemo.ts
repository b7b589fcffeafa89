/**
 * Multicast Failure Demo
 *
 * Shows the two ways a failing member affects a multicast list: invoked
 * as one combined call the failure aborts the remaining members; invoked
 * member by member with catch-and-continue, only the failing member is
 * reported and the rest still run.
 *
 * @module application/demos/MulticastFailureDemo
 */

import { injectable, inject } from 'tsyringe';
import type { ILogger } from '@/infrastructure/interfaces/ILogger';
import type { IOutput } from '@/infrastructure/interfaces/IOutput';
import { MulticastDelegate } from '@/domain/delegates/MulticastDelegate';
import type { Demo } from './Demo';

@injectable()
export class MulticastFailureDemo implements Demo {
  readonly name = 'multicast-failures' as const;

  constructor(
    @inject('IOutput') private readonly output: IOutput,
    @inject('ILogger') private readonly logger: ILogger
  ) {}

  run(): void {
    this.logger.info('Running multicast failures demo');

    const output = this.output;
    const first = (): void => output.writeLine('first handler ran');
    const failing = (): void => {
      output.writeLine('failing handler ran');
      throw new Error('failing handler threw');
    };
    const third = (): void => output.writeLine('third handler ran');

    const handlers = MulticastDelegate.of<[], void>(first, failing, third);

    output.writeLine('Combined invocation:');
    try {
      handlers?.invoke();
    } catch (error) {
      output.writeLine(`Combined invocation aborted: ${describeError(error)}`);
    }

    output.writeLine('Isolated invocation:');
    for (const member of handlers?.getInvocationList() ?? []) {
      try {
        member.invoke();
      } catch (error) {
        this.logger.debug('Delegate failed during isolated invocation', {
          handler: member.methodName,
          error: describeError(error),
        });
        output.writeLine(`Error invoking delegate: ${describeError(error)}`);
      }
    }
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
