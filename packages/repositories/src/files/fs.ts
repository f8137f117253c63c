// Filesystem and in-memory implementations of FileStore.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { FileStore } from '../interfaces/file-store.js';

/**
 * Create a FileStore backed by the local filesystem.
 *
 * Writes go to a sibling temp file that is then renamed over the target,
 * so readers see either the old or the new content.
 */
export function createFilesystemStore(): FileStore {
  return {
    async exists(filePath: string): Promise<boolean> {
      try {
        await fs.access(filePath);
        return true;
      } catch {
        return false;
      }
    },

    async readFile(filePath: string): Promise<string> {
      return fs.readFile(filePath, 'utf-8');
    },

    async writeFile(filePath: string, content: string): Promise<void> {
      // Ensure parent directory exists
      const dir = path.dirname(filePath);
      await fs.mkdir(dir, { recursive: true });

      const tempPath = `${filePath}.${process.pid}.tmp`;
      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, filePath);
    },
  };
}

/**
 * Create an in-memory FileStore for testing.
 * Returns the store and the Map of file contents it reads and writes.
 */
export function createInMemoryFileStore(initial: Record<string, string> = {}): {
  store: FileStore;
  files: Map<string, string>;
} {
  const files = new Map<string, string>(Object.entries(initial));

  const store: FileStore = {
    async exists(filePath: string): Promise<boolean> {
      return files.has(filePath);
    },

    async readFile(filePath: string): Promise<string> {
      const content = files.get(filePath);
      if (content === undefined) {
        throw new Error(`File not found: ${filePath}`);
      }
      return content;
    },

    async writeFile(filePath: string, content: string): Promise<void> {
      files.set(filePath, content);
    },
  };

  return { store, files };
}
