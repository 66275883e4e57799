import * as fs from 'fs';
import { OutputSinkError } from './output_sink';
import type { OutputSink } from './output_sink';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Writes lines synchronously to one file, truncating it on open.
 */
export class FileSink implements OutputSink {
  private fd: number | undefined;

  /**
   * @throws OutputSinkError when the file cannot be opened
   */
  constructor(private readonly path: string) {
    try {
      this.fd = fs.openSync(path, 'w');
    } catch (error) {
      throw new OutputSinkError(`Cannot open output file ${path}: ${describeError(error)}`, path);
    }
  }

  writeLine(line: string): void {
    if (this.fd === undefined) {
      throw new OutputSinkError(`Output file ${this.path} is closed`, this.path);
    }
    try {
      fs.writeSync(this.fd, `${line}\n`);
    } catch (error) {
      throw new OutputSinkError(`Cannot write output file ${this.path}: ${describeError(error)}`, this.path);
    }
  }

  close(): void {
    if (this.fd === undefined) return;
    const fd = this.fd;
    this.fd = undefined;
    fs.closeSync(fd);
  }
}
