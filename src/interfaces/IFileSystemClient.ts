import { DirectoryEntry, FileStats } from '../types';

/**
 * Interface for file system access
 */
export interface IFileSystemClient {
  /**
   * Get stats for a path, following symbolic links
   */
  stat(path: string): Promise<FileStats>;

  /**
   * Get stats for a path without following symbolic links
   */
  lstat(path: string): Promise<FileStats>;

  /**
   * Iterate the entries of a directory lazily
   */
  readDirectory(path: string): AsyncIterable<DirectoryEntry>;

  /**
   * Remove a single file
   */
  removeFile(path: string): Promise<void>;
}
