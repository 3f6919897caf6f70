// In-memory implementation of StorageProvider.
// Backs tests and data bundled into the application.

import { joinPath, matchesPattern, normalizePath } from '@tablekit/protocol';
import type { StorageProvider } from '../interfaces/storage-provider.js';
import { DEFAULT_MULTI_FILE_PATTERN } from '../interfaces/storage-provider.js';
import { FileNotFoundError, IOFailureError, type IOOperation } from '../errors.js';

export type InMemoryStorageProvider = StorageProvider & {
  /**
   * Current contents, keyed by normalized logical path
   */
  readonly files: Map<string, string>;
};

/**
 * Create an in-memory StorageProvider.
 * The initial files are copied; later writes land in `files`.
 */
export function createInMemoryProvider(
  initialFiles: Map<string, string> | Record<string, string> = {},
  options: { basePath?: string } = {}
): InMemoryStorageProvider {
  const files = new Map<string, string>();
  const entries = initialFiles instanceof Map ? initialFiles.entries() : Object.entries(initialFiles);
  for (const [filePath, content] of entries) {
    files.set(normalizePath(filePath), content);
  }

  const basePath = normalizePath(options.basePath ?? '');
  let closed = false;

  const ensureOpen = (logicalPath: string, operation: IOOperation) => {
    if (closed) {
      throw new IOFailureError(logicalPath, operation, 'provider is closed');
    }
  };

  const resolvePath = (logicalPath: string): string => `memory://${joinPath(basePath, logicalPath)}`;

  const listFiles = async (folder: string, pattern: string = DEFAULT_MULTI_FILE_PATTERN): Promise<string[]> => {
    ensureOpen(folder, 'list');
    const normalizedFolder = normalizePath(folder);
    const prefix = normalizedFolder ? `${normalizedFolder}/` : '';

    return Array.from(files.keys())
      .filter((filePath) => {
        if (!filePath.startsWith(prefix)) return false;
        const name = filePath.slice(prefix.length);
        return !name.includes('/') && matchesPattern(name, pattern);
      })
      .sort();
  };

  return {
    files,

    async loadText(logicalPath: string): Promise<string> {
      ensureOpen(logicalPath, 'read');
      const content = files.get(normalizePath(logicalPath));
      if (content === undefined) {
        throw new FileNotFoundError(logicalPath, resolvePath(logicalPath));
      }
      return content;
    },

    async saveText(logicalPath: string, content: string): Promise<void> {
      ensureOpen(logicalPath, 'write');
      files.set(normalizePath(logicalPath), content);
    },

    async deleteText(logicalPath: string): Promise<void> {
      ensureOpen(logicalPath, 'delete');
      files.delete(normalizePath(logicalPath));
    },

    async exists(logicalPath: string): Promise<boolean> {
      return !closed && files.has(normalizePath(logicalPath));
    },

    resolvePath,

    listFiles,

    async loadMultipleText(
      folder: string,
      pattern: string = DEFAULT_MULTI_FILE_PATTERN
    ): Promise<Map<string, string>> {
      const matches = await listFiles(folder, pattern);
      return new Map(matches.map((filePath) => [filePath, files.get(filePath) ?? '']));
    },

    async close(): Promise<void> {
      closed = true;
    },
  };
}
