import { RunOutcome, RunReport, Task } from '../types';
import { IExecutionMode, IReporter, IRunCoordinator, ITaskRunner } from '../interfaces';
import { RunStartError } from '../errors';

export interface ExecutionModes {
  simulate: IExecutionMode;
  apply: IExecutionMode;
}

/**
 * Runs every configured task, in configuration order, and aggregates the outcomes.
 *
 * Tasks run one after another. Their directories are assumed to be disjoint:
 * overlapping directories are neither detected nor prevented.
 */
export class RunCoordinator implements IRunCoordinator {
  private taskRunner: ITaskRunner;
  private modes: ExecutionModes;
  private reporter: IReporter;
  private clock: () => Date;

  constructor(
    taskRunner: ITaskRunner,
    modes: ExecutionModes,
    reporter: IReporter,
    clock: () => Date = () => new Date()
  ) {
    this.taskRunner = taskRunner;
    this.modes = modes;
    this.reporter = reporter;
    this.clock = clock;
  }

  /**
   * Execute every task; a failing task never stops the ones after it
   */
  async run(tasks: readonly Task[], globalDryRun: boolean): Promise<RunReport> {
    if (tasks.length === 0) {
      throw new RunStartError('No tasks configured, nothing to do');
    }

    // One reference time for the whole run
    const startedAt = this.clock();
    this.reporter.logRunStart(tasks.length, globalDryRun);

    const outcomes: RunOutcome[] = [];
    for (const task of tasks) {
      const mode = this.isDryRun(task, globalDryRun) ? this.modes.simulate : this.modes.apply;
      outcomes.push(await this.taskRunner.run(task, mode, startedAt));
    }

    const report = this.reporter.generateReport(outcomes, globalDryRun, startedAt, this.clock());
    this.reporter.logRunComplete(report);

    return report;
  }

  /**
   * Scan and evaluate every task without removing anything
   */
  async preview(tasks: readonly Task[]): Promise<RunReport> {
    return this.run(tasks, true);
  }

  /**
   * Dry-run is sticky: a task can opt into simulation but never out of it
   */
  isDryRun(task: Task, globalDryRun: boolean): boolean {
    return globalDryRun || task.dryRun === true;
  }
}
