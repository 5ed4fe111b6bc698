// Export the scan and report pipeline
export { TreeScanner } from "./scanner/TreeScanner";
export { ScanFileSystem, EntryStats, LocalScanFileSystem } from "./scanner/ScanFileSystem";
export { aggregate, ancestorsWithin } from "./aggregate/Aggregator";
export { buildReport, largestSize, topK } from "./report/Reporter";
export { renderReport, renderText, renderJson, renderItemDump } from "./report/renderers";
export { formatHumanSize, formatCount } from "./utils/formatHumanSize";

// Configuration and command line entry points
export { DEFAULT_CONFIG, parseArgs, resolveConfig, CliCommand } from "./config";
export { run, generateOutput, ExitCodes } from "./cli";

export * from "./types";
export * from "./errors";
