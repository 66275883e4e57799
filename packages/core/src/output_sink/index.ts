export { OutputSinkError } from './output_sink';
export type { OutputSink } from './output_sink';
export { ConsoleSink } from './console_sink';
export type { LineWritable } from './console_sink';
export { FileSink } from './file_sink';
export { MemorySink } from './memory_sink';
