import { FileDescriptor, ScanResult, ScanTarget, TaskIssue } from '../types';

/**
 * Interface for file scanning operations
 */
export interface IFileScanner {
  /**
   * Lazily yield descriptors of the files matching the target
   */
  scan(target: ScanTarget, onWarning?: (warning: TaskIssue) => void): AsyncIterable<FileDescriptor>;

  /**
   * Materialize a scan together with the warnings it produced
   */
  collect(target: ScanTarget): Promise<ScanResult>;
}
