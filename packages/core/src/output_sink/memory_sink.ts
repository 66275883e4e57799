import type { OutputSink } from './output_sink';

/**
 * Collects lines in memory. Used by tests and by callers embedding the
 * walker.
 */
export class MemorySink implements OutputSink {
  readonly lines: string[] = [];
  closed = false;

  writeLine(line: string): void {
    if (this.closed) {
      throw new Error('MemorySink: write after close');
    }
    this.lines.push(line);
  }

  close(): void {
    this.closed = true;
  }

  /** Everything written, newline-terminated like the other sinks */
  text(): string {
    return this.lines.map(line => `${line}\n`).join('');
  }
}
