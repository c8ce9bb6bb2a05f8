import { DeletionResult, EligibleFile, FileDescriptor, TaskIssue } from '../types';
import { IExecutionMode, IFileSystemClient, IReporter } from '../interfaces';
import { DeletionError, errorCode, errorMessage } from '../errors';

/**
 * Dry-run mode: reports the plan and touches nothing
 */
export class SimulateMode implements IExecutionMode {
  readonly simulated = true;

  async decide(_eligible: readonly EligibleFile[]): Promise<DeletionResult> {
    return {
      simulated: true,
      removed: [],
      failures: [],
      warnings: []
    };
  }
}

/**
 * Apply mode: removes every planned file, one failure never stops the rest
 */
export class ApplyMode implements IExecutionMode {
  readonly simulated = false;
  private fsClient: IFileSystemClient;
  private reporter?: IReporter;

  constructor(fsClient: IFileSystemClient, reporter?: IReporter) {
    this.fsClient = fsClient;
    this.reporter = reporter;
  }

  async decide(eligible: readonly EligibleFile[]): Promise<DeletionResult> {
    const removed: FileDescriptor[] = [];
    const failures: TaskIssue[] = [];
    const warnings: TaskIssue[] = [];

    for (const { file } of eligible) {
      try {
        await this.fsClient.removeFile(file.path);
        removed.push(file);
        this.reporter?.logFileRemoval(file, true);
      } catch (error) {
        const code = errorCode(error);

        // Another process got there first; the file is gone either way
        if (code === 'ENOENT') {
          warnings.push({
            kind: 'vanished',
            path: file.path,
            code,
            message: 'File disappeared before it could be removed'
          });
          continue;
        }

        const deletionError = new DeletionError(
          `Failed to remove file: ${errorMessage(error)}`,
          file.path,
          code
        );
        failures.push({
          kind: 'deletion',
          path: deletionError.path,
          code: deletionError.code,
          message: deletionError.message
        });
        this.reporter?.logFileRemoval(file, false, deletionError.message);
      }
    }

    return { simulated: false, removed, failures, warnings };
  }
}

/**
 * Pick the execution mode for a task
 */
export function createExecutionMode(simulate: boolean, fsClient: IFileSystemClient, reporter?: IReporter): IExecutionMode {
  return simulate ? new SimulateMode() : new ApplyMode(fsClient, reporter);
}
