/**
 * Line-oriented output sink for demonstration text.
 *
 * Kept separate from {@link ILogger}: demo output is the program's result
 * and must stay deterministic, while log lines depend on the log level.
 */
export interface IOutput {
  /**
   * Write one line of text followed by a newline.
   *
   * @param line - Text to write; an empty line when omitted
   */
  writeLine(line?: string): void;
}
