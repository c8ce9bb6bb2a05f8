import { RunReport, Task } from '../types';

/**
 * Interface for coordinating a full run over all tasks
 */
export interface IRunCoordinator {
  /**
   * Run every task in order
   */
  run(tasks: readonly Task[], globalDryRun: boolean): Promise<RunReport>;

  /**
   * Run every task in simulate mode regardless of flags
   */
  preview(tasks: readonly Task[]): Promise<RunReport>;
}
