import { EligibleFile, FileDescriptor, RunOutcome, RunReport, Task, TaskIssue } from '../types';
import winston from 'winston';

/**
 * Interface for reporting and logging operations
 */
export interface IReporter {
  /**
   * Build the aggregate report for a finished run
   */
  generateReport(
    outcomes: RunOutcome[],
    dryRun: boolean,
    startedAt: Date,
    finishedAt: Date
  ): RunReport;

  /**
   * Render a plain-text summary of a report
   */
  generateSummary(report: RunReport): string;

  /**
   * Save report as JSON
   */
  saveReport(report: RunReport, filePath: string): Promise<string>;

  /**
   * Log run start
   */
  logRunStart(taskCount: number, dryRun: boolean): void;

  /**
   * Log run completion
   */
  logRunComplete(report: RunReport): void;

  /**
   * Log task start
   */
  logTaskStart(task: Task, simulated: boolean): void;

  /**
   * Log task completion
   */
  logTaskComplete(outcome: RunOutcome): void;

  /**
   * Log a file chosen for deletion
   */
  logFileSelected(taskId: string, eligible: EligibleFile, simulated: boolean): void;

  /**
   * Log a removal attempt
   */
  logFileRemoval(file: FileDescriptor, success: boolean, error?: string): void;

  /**
   * Log a non-fatal problem
   */
  logWarning(taskId: string, warning: TaskIssue): void;

  /**
   * Get logger instance for external use
   */
  getLogger(): winston.Logger;
}
