import { RunOutcome, Task } from '../types';
import { IExecutionMode } from './IExecutionMode';

/**
 * Interface for running a single cleanup task
 */
export interface ITaskRunner {
  /**
   * Scan, evaluate and execute one task; never rejects
   */
  run(task: Task, mode: IExecutionMode, now: Date): Promise<RunOutcome>;
}
