import type { IOutput } from '@/infrastructure/interfaces/IOutput';

/**
 * Output sink collecting lines in memory.
 */
export class MemoryOutput implements IOutput {
  readonly lines: string[] = [];

  writeLine(line = ''): void {
    this.lines.push(line);
  }
}
