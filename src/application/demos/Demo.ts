import type { DemoName } from '@/shared/types/ConfigTypes';

/**
 * A runnable demonstration writing its result lines to an output sink.
 */
export interface Demo {
  readonly name: DemoName;
  run(): void;
}
