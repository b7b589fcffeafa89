/**
 * DemoRunner Service
 *
 * Runs registered demos by name, in the requested order.
 *
 * @module application/services/DemoRunner
 */

import { injectable, inject, injectAll } from 'tsyringe';
import type { ILogger } from '@/infrastructure/interfaces/ILogger';
import type { IOutput } from '@/infrastructure/interfaces/IOutput';
import type { Demo } from '@/application/demos/Demo';

@injectable()
export class DemoRunner {
  private readonly demos: ReadonlyMap<string, Demo>;

  constructor(
    @injectAll('Demo') demos: Demo[],
    @inject('IOutput') private readonly output: IOutput,
    @inject('ILogger') private readonly logger: ILogger
  ) {
    this.demos = new Map(demos.map((demo) => [demo.name, demo]));
    this.logger.debug('DemoRunner initialized', { demos: [...this.demos.keys()] });
  }

  /** Names of the registered demos. */
  getAvailableDemos(): string[] {
    return [...this.demos.keys()];
  }

  /**
   * Runs the named demos in order, separated by a blank line.
   *
   * @throws Error naming the first unknown demo; nothing runs in that case
   * @throws Error wrapping the first demo failure, with the original as `cause`
   */
  runAll(names: readonly string[]): void {
    const selected = names.map((name) => {
      const demo = this.demos.get(name);
      if (!demo) {
        throw new Error(
          `Unknown demo: ${name}. Available demos: ${this.getAvailableDemos().join(', ')}`
        );
      }
      return demo;
    });

    selected.forEach((demo, index) => {
      if (index > 0) {
        this.output.writeLine();
      }
      this.run(demo);
    });

    this.logger.info('All demos completed', { count: selected.length });
  }

  private run(demo: Demo): void {
    this.logger.debug('Starting demo', { demo: demo.name });
    try {
      demo.run();
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error('Demo failed', { demo: demo.name, error: errorMessage });
      throw new Error(`Demo "${demo.name}" failed: ${errorMessage}`, { cause: error });
    }
    this.logger.debug('Demo completed', { demo: demo.name });
  }
}
