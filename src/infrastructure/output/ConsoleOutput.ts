import { injectable } from 'tsyringe';
import type { IOutput } from '../interfaces/IOutput';

/**
 * Writes demonstration lines to standard output.
 */
@injectable()
export class ConsoleOutput implements IOutput {
  writeLine(line = ''): void {
    process.stdout.write(`${line}\n`);
  }
}
