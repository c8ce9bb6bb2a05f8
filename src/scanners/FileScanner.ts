import * as path from 'path';
import { FileDescriptor, ScanResult, ScanTarget, TaskIssue } from '../types';
import { IFileScanner, IFileSystemClient } from '../interfaces';
import { ScanError, errorCode, errorMessage } from '../errors';
import { PatternMatcher } from '../utils';

/**
 * File scanner implementation
 * Finds the files under a task's directory whose name matches its pattern.
 * Symbolic links are never followed: a link is neither selected nor descended into.
 */
export class FileScanner implements IFileScanner {
  private fsClient: IFileSystemClient;

  constructor(fsClient: IFileSystemClient) {
    this.fsClient = fsClient;
  }

  /**
   * Lazily yield matching files. Each call starts a fresh walk.
   * Throws ScanError on the first iteration if the root cannot be scanned.
   */
  async *scan(target: ScanTarget, onWarning: (warning: TaskIssue) => void = () => {}): AsyncGenerator<FileDescriptor> {
    await this.assertScannableRoot(target.directory);

    const matcher = new PatternMatcher(target.pattern);
    const pending: string[] = [target.directory];

    while (pending.length > 0) {
      const dirPath = pending.shift();
      if (dirPath === undefined) break;

      const isRoot = dirPath === target.directory;

      try {
        for await (const entry of this.fsClient.readDirectory(dirPath)) {
          const entryPath = path.join(dirPath, entry.name);

          if (entry.isSymbolicLink) {
            continue;
          }

          if (entry.isDirectory) {
            if (target.recursive) {
              pending.push(entryPath);
            }
            continue;
          }

          if (!matcher.matches(entry.name)) {
            continue;
          }

          const descriptor = await this.describe(entryPath, entry.name, onWarning);
          if (descriptor) {
            yield descriptor;
          }
        }
      } catch (error) {
        if (isRoot) {
          throw this.toScanError(target.directory, error);
        }
        // Unreadable subdirectories only cost their own entries
        onWarning({
          kind: 'stat',
          path: dirPath,
          code: errorCode(error),
          message: `Cannot read directory: ${errorMessage(error)}`
        });
      }
    }
  }

  /**
   * Materialize a scan together with the warnings it produced
   */
  async collect(target: ScanTarget): Promise<ScanResult> {
    const files: FileDescriptor[] = [];
    const warnings: TaskIssue[] = [];

    for await (const file of this.scan(target, warning => warnings.push(warning))) {
      files.push(file);
    }

    return { files, warnings };
  }

  /**
   * Stat a matching entry; entries that vanish or cannot be stat-ed become warnings
   */
  private async describe(
    filePath: string,
    name: string,
    onWarning: (warning: TaskIssue) => void
  ): Promise<FileDescriptor | undefined> {
    try {
      const stats = await this.fsClient.lstat(filePath);

      // Sockets, FIFOs and devices are not log files
      if (!stats.isFile) {
        return undefined;
      }

      return {
        path: filePath,
        name,
        size: stats.size,
        modifiedAt: stats.modifiedAt
      };
    } catch (error) {
      onWarning({
        kind: 'stat',
        path: filePath,
        code: errorCode(error),
        message: `Cannot stat file: ${errorMessage(error)}`
      });
      return undefined;
    }
  }

  private async assertScannableRoot(directory: string): Promise<void> {
    let isDirectory: boolean;

    try {
      isDirectory = (await this.fsClient.stat(directory)).isDirectory;
    } catch (error) {
      throw this.toScanError(directory, error);
    }

    if (!isDirectory) {
      throw new ScanError(`Not a directory: ${directory}`, directory, 'ENOTDIR');
    }
  }

  private toScanError(directory: string, error: unknown): ScanError {
    if (error instanceof ScanError) {
      return error;
    }

    const code = errorCode(error);
    const reason = code === 'ENOENT'
      ? 'Directory does not exist'
      : code === 'EACCES' || code === 'EPERM'
        ? 'Directory is not readable'
        : 'Cannot scan directory';

    return new ScanError(`${reason}: ${directory} (${errorMessage(error)})`, directory, code);
  }
}
