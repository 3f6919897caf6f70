// Filesystem implementation of StorageProvider.
// Uses Node.js fs module for local filesystem operations.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { joinPath, matchesPattern, normalizePath } from '@tablekit/protocol';
import type { StorageProvider } from '../interfaces/storage-provider.js';
import { DEFAULT_MULTI_FILE_PATTERN } from '../interfaces/storage-provider.js';
import { FileNotFoundError, IOFailureError, toError, type IOOperation } from '../errors.js';

const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR', 'EISDIR']);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Create a StorageProvider rooted at a directory on the local filesystem.
 * Logical paths are resolved beneath `basePath`.
 */
export function createFileSystemProvider(basePath: string): StorageProvider {
  const root = path.resolve(basePath);
  let closed = false;

  const resolvePath = (logicalPath: string): string => {
    const normalized = normalizePath(logicalPath);
    return normalized ? path.resolve(root, ...normalized.split('/')) : root;
  };

  const ensureOpen = (logicalPath: string, operation: IOOperation) => {
    if (closed) {
      throw new IOFailureError(logicalPath, operation, 'provider is closed');
    }
  };

  const loadText = async (logicalPath: string): Promise<string> => {
    ensureOpen(logicalPath, 'read');
    const fullPath = resolvePath(logicalPath);
    try {
      return await fs.readFile(fullPath, 'utf-8');
    } catch (error) {
      const code = errorCode(error);
      if (code && MISSING_CODES.has(code)) {
        throw new FileNotFoundError(logicalPath, fullPath);
      }
      const cause = toError(error);
      throw new IOFailureError(logicalPath, 'read', cause.message, cause);
    }
  };

  const listFiles = async (folder: string, pattern: string = DEFAULT_MULTI_FILE_PATTERN): Promise<string[]> => {
    ensureOpen(folder, 'list');
    try {
      const dirents = await fs.readdir(resolvePath(folder), { withFileTypes: true });
      return dirents
        .filter((dirent) => dirent.isFile() && matchesPattern(dirent.name, pattern))
        .map((dirent) => dirent.name)
        .sort()
        .map((name) => joinPath(folder, name));
    } catch (error) {
      const code = errorCode(error);
      if (code && MISSING_CODES.has(code)) {
        return [];
      }
      const cause = toError(error);
      throw new IOFailureError(folder, 'list', cause.message, cause);
    }
  };

  return {
    loadText,

    async saveText(logicalPath: string, content: string): Promise<void> {
      ensureOpen(logicalPath, 'write');
      const fullPath = resolvePath(logicalPath);
      try {
        // Ensure parent directory exists
        await fs.mkdir(path.dirname(fullPath), { recursive: true });
        await fs.writeFile(fullPath, content, 'utf-8');
      } catch (error) {
        const cause = toError(error);
        throw new IOFailureError(logicalPath, 'write', cause.message, cause);
      }
    },

    async deleteText(logicalPath: string): Promise<void> {
      ensureOpen(logicalPath, 'delete');
      try {
        await fs.rm(resolvePath(logicalPath), { force: true });
      } catch (error) {
        const cause = toError(error);
        throw new IOFailureError(logicalPath, 'delete', cause.message, cause);
      }
    },

    async exists(logicalPath: string): Promise<boolean> {
      if (closed) return false;
      try {
        const stat = await fs.stat(resolvePath(logicalPath));
        return stat.isFile();
      } catch {
        return false;
      }
    },

    resolvePath,

    listFiles,

    async loadMultipleText(
      folder: string,
      pattern: string = DEFAULT_MULTI_FILE_PATTERN
    ): Promise<Map<string, string>> {
      const logicalPaths = await listFiles(folder, pattern);
      const contents = await Promise.all(logicalPaths.map((logicalPath) => loadText(logicalPath)));

      return new Map(logicalPaths.map((logicalPath, i) => [logicalPath, contents[i]]));
    },

    async close(): Promise<void> {
      closed = true;
    },
  };
}
