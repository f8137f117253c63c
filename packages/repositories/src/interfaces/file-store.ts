/**
 * Minimal file access used by the ledger and the reference-data loaders.
 * Lets tests swap the filesystem for an in-memory map.
 */
export interface FileStore {
  exists(filePath: string): Promise<boolean>;
  readFile(filePath: string): Promise<string>;

  /**
   * Replace the whole file. Implementations must not leave a partially
   * written file behind.
   */
  writeFile(filePath: string, content: string): Promise<void>;
}
