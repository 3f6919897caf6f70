/**
 * Default pattern for multi-file loads
 */
export const DEFAULT_MULTI_FILE_PATTERN = '*.json';

/**
 * StorageProvider is the I/O boundary for raw text.
 *
 * It resolves logical paths (relative, '/'-separated) to physical locations
 * and reads or writes text. It knows nothing about the shape of the data.
 * Implementations can back onto the local filesystem, an embedded bundle,
 * a blob store, etc.
 */
export interface StorageProvider {
  /**
   * Read the text behind a logical path.
   * @throws FileNotFoundError when the path resolves to nothing
   * @throws IOFailureError for any other read failure
   */
  loadText(path: string): Promise<string>;

  /**
   * Write text to a logical path, creating parent directories as needed
   * and replacing existing content.
   * @throws IOFailureError when the write fails
   */
  saveText(path: string, content: string): Promise<void>;

  /**
   * Remove the content at a logical path. Removing nothing is not an error.
   * @throws IOFailureError when the removal fails
   */
  deleteText(path: string): Promise<void>;

  /**
   * Check whether content exists at a logical path. Never rejects.
   */
  exists(path: string): Promise<boolean>;

  /**
   * Physical location of a logical path, for diagnostics. Performs no I/O.
   */
  resolvePath(path: string): string;

  /**
   * Logical paths of the files directly inside a folder whose name matches
   * `pattern` (`*` and `?` wildcards), sorted. Reads no content.
   * A missing folder yields an empty list.
   */
  listFiles(folder: string, pattern?: string): Promise<string[]>;

  /**
   * Read every file directly inside a folder whose name matches `pattern`
   * (`*` and `?` wildcards). Keys are logical paths in sorted order.
   * A missing folder yields an empty map.
   */
  loadMultipleText(folder: string, pattern?: string): Promise<Map<string, string>>;

  /**
   * Release any resources held by the provider.
   */
  close(): Promise<void>;
}
