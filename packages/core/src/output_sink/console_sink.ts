import type { OutputSink } from './output_sink';

/**
 * Minimal writable the console sink needs; process.stdout by default.
 */
export interface LineWritable {
  write(chunk: string): boolean;
}

/**
 * Writes lines to standard output.
 */
export class ConsoleSink implements OutputSink {
  constructor(private readonly stream: LineWritable = process.stdout) {}

  writeLine(line: string): void {
    this.stream.write(`${line}\n`);
  }

  close(): void {
    // stdout stays open for the rest of the process
  }
}
