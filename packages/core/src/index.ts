// Namespaced module exports
export * as Config from "./config";
export * as Counter from "./counter";
export * as CycleGuard from "./cycle_guard";
export * as Filter from "./filter";
export * as Identity from "./identity";
export * as Logger from "./logger";
export * as OutputSink from "./output_sink";
export * as PathSource from "./path_source";
export * as Render from "./render";
export * as Sort from "./sort";
export * as Traversal from "./traversal";
export * as Types from "./types";

// Entry points used by the command line
export { createTreeConfig, DEFAULT_TREE_CONFIG } from "./config";
export { ConfigurationError } from "./config";
export type { TreeConfig, TreeConfigInput, SortKey, ColorMode, SizeMode } from "./config";
export { createLogger } from "./logger";
export type { Logger as LoggerInstance, LogLevel } from "./logger";
export { FsPathSource, ListingPathSource, PathSourceError, readListings } from "./path_source";
export type { PathSource as PathSourceInstance } from "./path_source";
export { ConsoleSink, FileSink, MemorySink, OutputSinkError } from "./output_sink";
export type { OutputSink as OutputSinkInstance } from "./output_sink";
export { createColorizer, LineFormatter } from "./render";
export { IdentityResolver } from "./identity";
export { TreeWalker } from "./traversal";
export type { TraversalReport, TraversalIssue } from "./traversal";
