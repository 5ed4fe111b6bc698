import path from "path";
import { Item } from "../types";

/**
 * Yields the ancestors of an entry from its parent up to and including root.
 * Nothing is yielded for root itself or for paths outside root.
 */
export function* ancestorsWithin(entryPath: string, root: string): Generator<string> {
  let current = entryPath;
  while (current !== root) {
    const parent = path.dirname(current);
    if (parent === current) return;
    const relative = path.relative(root, parent);
    if (
      relative === ".." ||
      relative.startsWith(`..${path.sep}`) ||
      path.isAbsolute(relative)
    ) {
      return;
    }
    yield parent;
    current = parent;
  }
}

/**
 * Propagate every item's size and count into its enclosing directories.
 *
 * Each ancestor gains 1 in fileCount and the item's scan-time size, so a
 * directory ends up with its own lstat size plus the raw sizes of all its
 * descendants. Sizes are read before the pass so the result does not depend
 * on iteration order.
 */
export function aggregate(items: Map<string, Item>, root: string): void {
  const rawSizes = new Map<string, number>();
  for (const [itemPath, item] of items) {
    rawSizes.set(itemPath, item.size);
  }

  for (const [itemPath, rawSize] of rawSizes) {
    for (const ancestorPath of ancestorsWithin(itemPath, root)) {
      const ancestor = items.get(ancestorPath);
      if (!ancestor) continue;
      ancestor.fileCount += 1;
      ancestor.size += rawSize;
    }
  }
}
