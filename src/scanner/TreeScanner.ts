import path from "path";
import { Item, ScanFailure, ScanResult } from "../types";
import { ScanError, errorMessage } from "../errors";
import { LocalScanFileSystem, ScanFileSystem } from "./ScanFileSystem";

/**
 * Walks a directory tree and records one Item per reachable entry.
 *
 * Entries are visited depth-first, one filesystem call at a time. An entry
 * that cannot be read is reported on stderr and its subtree is pruned; the
 * rest of the scan carries on.
 */
export class TreeScanner {
  private fileSystem: ScanFileSystem;

  constructor(fileSystem?: ScanFileSystem) {
    this.fileSystem = fileSystem || new LocalScanFileSystem();
  }

  /**
   * Scan a directory tree
   *
   * @param root - Directory to start from
   * @returns The scanned items keyed by absolute path, plus skipped entries
   */
  async scan(root: string): Promise<ScanResult> {
    const rootPath = path.resolve(root);
    const items = new Map<string, Item>();
    const skipped: ScanFailure[] = [];

    const pending: string[] = [rootPath];
    while (pending.length > 0) {
      const current = pending.pop();
      if (current === undefined) break;

      const item = await this.visit(current, skipped);
      if (!item) continue;
      items.set(item.path, item);

      if (item.isDirectory) {
        const children = await this.listChildren(current, skipped);
        // Reverse so the stack pops children in name order
        for (let i = children.length - 1; i >= 0; i--) {
          pending.push(path.join(current, children[i]));
        }
      }
    }

    return { root: rootPath, items, skipped };
  }

  private async visit(
    entryPath: string,
    skipped: ScanFailure[],
  ): Promise<Item | null> {
    try {
      const stats = await this.fileSystem.lstat(entryPath);
      return {
        path: entryPath,
        size: stats.size,
        isDirectory: stats.isDirectory(),
        fileCount: 0,
      };
    } catch (error: unknown) {
      this.reportFailure(
        new ScanError(`Cannot stat: ${errorMessage(error)}`, entryPath),
        skipped,
      );
      return null;
    }
  }

  private async listChildren(
    dirPath: string,
    skipped: ScanFailure[],
  ): Promise<string[]> {
    try {
      const names = await this.fileSystem.readdir(dirPath);
      return [...names].sort();
    } catch (error: unknown) {
      this.reportFailure(
        new ScanError(`Cannot read directory: ${errorMessage(error)}`, dirPath),
        skipped,
      );
      return [];
    }
  }

  private reportFailure(error: ScanError, skipped: ScanFailure[]): void {
    console.error(`⚠️ Skipping ${error.path}: ${error.message}`);
    skipped.push({ path: error.path, reason: error.message });
  }
}
