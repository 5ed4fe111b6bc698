const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

/**
 * Format bytes to a human readable string using binary units
 */
export function formatHumanSize(bytes: number): string {
  if (bytes < 0) return "0 B";
  if (bytes < KB) return `${Math.floor(bytes)} B`;
  if (bytes < MB) return `${(bytes / KB).toFixed(2)} KB`;
  if (bytes < GB) return `${(bytes / MB).toFixed(2)} MB`;
  return `${(bytes / GB).toFixed(2)} GB`;
}

/**
 * Format an integer count with thousands separators
 */
export function formatCount(count: number): string {
  return count.toLocaleString("en-US");
}
