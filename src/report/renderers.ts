import { Item, OutputFormat, Report } from "../types";
import { formatCount, formatHumanSize } from "../utils/formatHumanSize";

function renderSection(
  title: string,
  items: Item[],
  formatValue: (item: Item) => string,
): string[] {
  const lines = [title];
  if (items.length === 0) {
    lines.push("  (none)");
    return lines;
  }

  const values = items.map(formatValue);
  const width = values.reduce((widest, value) => Math.max(widest, value.length), 0);
  items.forEach((item, index) => {
    lines.push(`  ${values[index].padStart(width)}  ${item.path}`);
  });
  return lines;
}

/**
 * Render the report as aligned plain text
 */
export function renderText(report: Report): string {
  const heading = `Directory report: ${report.root}`;
  const size = (item: Item) => formatHumanSize(item.size);
  const count = (item: Item) => formatCount(item.fileCount);

  return [
    heading,
    "=".repeat(heading.length),
    `Items: ${formatCount(report.totalItems)} (${formatCount(report.totalFiles)} files, ${formatCount(report.totalDirs)} directories)`,
    `Total size: ${formatHumanSize(report.totalSize)}`,
    "",
    ...renderSection(`Top ${report.topFiles.length} files by size:`, report.topFiles, size),
    "",
    ...renderSection(
      `Top ${report.topDirsBySize.length} directories by size:`,
      report.topDirsBySize,
      size,
    ),
    "",
    ...renderSection(
      `Top ${report.topDirsByCount.length} directories by file count:`,
      report.topDirsByCount,
      count,
    ),
  ].join("\n");
}

/**
 * Render the report as a JSON document
 */
export function renderJson(report: Report): string {
  return JSON.stringify(report, null, 2);
}

/**
 * Render the report in the requested format
 */
export function renderReport(report: Report, format: OutputFormat): string {
  switch (format) {
    case "json":
      return renderJson(report);
    case "text":
      return renderText(report);
  }
}

/**
 * Render every scanned item as a JSON array, in scan order
 */
export function renderItemDump(items: Map<string, Item>): string {
  const entries = [...items.values()].map((item) => ({
    path: item.path,
    size: item.size,
    isDirectory: item.isDirectory,
    fileCount: item.fileCount,
  }));
  return JSON.stringify(entries, null, 2);
}
