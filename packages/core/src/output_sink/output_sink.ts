/**
 * OutputSink Interface
 *
 * Line-oriented destination for tree output. Lines are written as they are
 * produced; nothing already written is rolled back on a later failure.
 *
 * @module output_sink
 */
export interface OutputSink {
  /** Writes one line; the sink appends the newline */
  writeLine(line: string): void;
  /** Flushes and releases the destination. Further writes are errors. */
  close(): void;
}

/**
 * Error thrown when a sink cannot open or write its destination.
 */
export class OutputSinkError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = 'OutputSinkError';
  }
}
