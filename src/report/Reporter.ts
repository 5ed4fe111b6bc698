import { Item, Report, ReportConfig } from "../types";
import { EmptyResultError } from "../errors";

/**
 * Return at most `k` items ordered by descending key. Equal keys keep their
 * original order.
 */
export function topK(items: Item[], k: number, key: (item: Item) => number): Item[] {
  return [...items].sort((a, b) => key(b) - key(a)).slice(0, Math.max(0, k));
}

/**
 * Largest size across all items.
 *
 * This is reported as the run's total size. It is the size of the biggest
 * single entry, which after aggregation is normally the scan root.
 */
export function largestSize(items: Item[]): number {
  if (items.length === 0) {
    throw new EmptyResultError("Cannot compute total size: empty result set");
  }
  return items.reduce((max, item) => (item.size > max ? item.size : max), items[0].size);
}

/**
 * Build the ranked report from an aggregated item map
 */
export function buildReport(
  items: Map<string, Item>,
  config: Pick<ReportConfig, "directory" | "top">,
): Report {
  const all = [...items.values()];
  const directories = all.filter((item) => item.isDirectory);
  const files = all.filter((item) => !item.isDirectory);

  return {
    root: config.directory,
    totalItems: all.length,
    totalFiles: files.length,
    totalDirs: directories.length,
    totalSize: largestSize(all),
    topFiles: topK(files, config.top, (item) => item.size),
    topDirsBySize: topK(directories, config.top, (item) => item.size),
    topDirsByCount: topK(directories, config.top, (item) => item.fileCount),
  };
}
