import fs from "fs-extra";

/**
 * Metadata the scanner needs from a single lstat call
 */
export interface EntryStats {
  size: number;
  isDirectory(): boolean;
}

/**
 * Interface for the filesystem calls made during a scan
 */
export interface ScanFileSystem {
  /**
   * Reads an entry's own metadata without following symlinks
   *
   * @param entryPath - Path of the entry
   */
  lstat(entryPath: string): Promise<EntryStats>;

  /**
   * Lists the names of a directory's children
   *
   * @param dirPath - Path of the directory
   */
  readdir(dirPath: string): Promise<string[]>;
}

/**
 * Default implementation backed by fs-extra
 */
export class LocalScanFileSystem implements ScanFileSystem {
  async lstat(entryPath: string): Promise<EntryStats> {
    return fs.lstat(entryPath);
  }

  async readdir(dirPath: string): Promise<string[]> {
    return fs.readdir(dirPath);
  }
}
