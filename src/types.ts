/**
 * A single filesystem entry captured during a scan
 */
export interface Item {
  /** Absolute path, unique within a scan */
  path: string;
  /** lstat size; directories accumulate descendant sizes during aggregation */
  size: number;
  isDirectory: boolean;
  /** Number of entries strictly beneath this one, filled in by aggregation */
  fileCount: number;
}

/**
 * An entry the scanner could not read
 */
export interface ScanFailure {
  path: string;
  reason: string;
}

export interface ScanResult {
  root: string;
  items: Map<string, Item>;
  skipped: ScanFailure[];
}

export type OutputFormat = "text" | "json";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["text", "json"];

/**
 * Options for a single report run
 */
export interface ReportConfig {
  /**
   * Directory to scan, resolved to an absolute path
   */
  directory: string;

  /**
   * Number of entries in each ranked list (default: 20)
   */
  top: number;

  /**
   * Renderer used for the report (default: "text")
   */
  outputFormat: OutputFormat;

  /**
   * Print every scanned item instead of the ranked report
   */
  dumpItems: boolean;
}

export interface Report {
  root: string;
  totalItems: number;
  totalFiles: number;
  totalDirs: number;
  /** Size of the single largest item, not a sum */
  totalSize: number;
  topFiles: Item[];
  topDirsBySize: Item[];
  topDirsByCount: Item[];
}
