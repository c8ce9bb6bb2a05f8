import * as fs from 'fs';
import { DirectoryEntry, FileStats } from '../types';
import { IFileSystemClient } from '../interfaces';

/**
 * File system client backed by node's fs promises API
 */
export class FileSystemClient implements IFileSystemClient {
  /**
   * Get stats for a path, following symbolic links
   */
  async stat(filePath: string): Promise<FileStats> {
    return this.toFileStats(await fs.promises.stat(filePath));
  }

  /**
   * Get stats for a path without following symbolic links
   */
  async lstat(filePath: string): Promise<FileStats> {
    return this.toFileStats(await fs.promises.lstat(filePath));
  }

  /**
   * Iterate directory entries one at a time instead of reading the whole listing
   */
  async *readDirectory(dirPath: string): AsyncIterable<DirectoryEntry> {
    const dir = await fs.promises.opendir(dirPath);

    // Iterating a Dir closes it when the loop ends or throws
    for await (const entry of dir) {
      yield {
        name: entry.name,
        isFile: entry.isFile(),
        isDirectory: entry.isDirectory(),
        isSymbolicLink: entry.isSymbolicLink()
      };
    }
  }

  /**
   * Remove a single file
   */
  async removeFile(filePath: string): Promise<void> {
    await fs.promises.unlink(filePath);
  }

  private toFileStats(stats: fs.Stats): FileStats {
    return {
      size: stats.size,
      modifiedAt: stats.mtime,
      isFile: stats.isFile(),
      isDirectory: stats.isDirectory(),
      isSymbolicLink: stats.isSymbolicLink()
    };
  }
}
