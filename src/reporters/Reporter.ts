import {
  EligibleFile,
  FileDescriptor,
  LoggingOptions,
  RunOutcome,
  RunReport,
  RunTotals,
  Task,
  TaskIssue
} from '../types';
import { IReporter } from '../interfaces';
import { errorMessage } from '../errors';
import { PatternMatcher, SizeCalculator } from '../utils';
import * as fs from 'fs';
import * as path from 'path';
import winston from 'winston';

/**
 * Reporter for run summaries and logs
 */
export class Reporter implements IReporter {
  private logger!: winston.Logger;
  private options: LoggingOptions;

  constructor(options: Partial<LoggingOptions> = {}) {
    this.options = { level: 'info', ...options };
    this.setupLogger();
  }

  /**
   * Build the aggregate report for a finished run
   */
  generateReport(outcomes: RunOutcome[], dryRun: boolean, startedAt: Date, finishedAt: Date): RunReport {
    const totals = this.calculateTotals(outcomes);

    const report: RunReport = {
      startedAt,
      finishedAt,
      durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
      dryRun,
      outcomes,
      anyFailed: totals.failedTasks > 0,
      totals
    };

    this.logger.debug('Run report generated', { totals, anyFailed: report.anyFailed });

    return report;
  }

  /**
   * Generate summary text
   */
  generateSummary(report: RunReport): string {
    const { totals } = report;
    const lines: string[] = [];

    lines.push(`=== logsweep report (${report.dryRun ? 'DRY-RUN' : 'APPLY'}) ===`);
    lines.push(`Started: ${report.startedAt.toISOString()}`);
    lines.push(`Duration: ${(report.durationMs / 1000).toFixed(2)}s`);
    lines.push('');

    lines.push('TASKS:');
    report.outcomes.forEach(outcome => {
      const status = outcome.failures.length > 0 ? 'FAILED' : 'OK';
      const mode = outcome.simulated ? ' (dry-run)' : '';
      lines.push(
        `  ${outcome.taskId} [${status}]${mode}: scanned ${outcome.scanned}, kept ${outcome.kept}, ` +
        `selected ${outcome.selected.length} (${SizeCalculator.formatBytes(outcome.bytesSelected)}), ` +
        `removed ${outcome.removed.length} (${SizeCalculator.formatBytes(outcome.bytesRemoved)})`
      );
      outcome.selected.forEach(({ file, reasons }) => {
        const verb = outcome.simulated ? 'would remove' : 'selected';
        lines.push(`    ${verb}: ${file.path} [${reasons.join(', ')}]`);
      });
    });
    lines.push('');

    const failures = this.collectIssues(report, 'failures');
    if (failures.length > 0) {
      lines.push('FAILURES:');
      failures.forEach(line => lines.push(line));
      lines.push('');
    }

    const warnings = this.collectIssues(report, 'warnings');
    if (warnings.length > 0) {
      lines.push('WARNINGS:');
      warnings.forEach(line => lines.push(line));
      lines.push('');
    }

    const succeeded = totals.tasks - totals.failedTasks;
    lines.push(`Files ${report.dryRun ? 'that would be ' : ''}removed: ${report.dryRun ? totals.filesSelected : totals.filesRemoved}`);
    lines.push(`Space ${report.dryRun ? 'that would be ' : ''}freed: ${SizeCalculator.formatBytes(report.dryRun ? totals.bytesSelected : totals.bytesRemoved)}`);
    lines.push(`Successful tasks: ${succeeded}/${totals.tasks} [${this.percentage(succeeded, totals.tasks)}%]`);
    lines.push(`Failed tasks:     ${totals.failedTasks}/${totals.tasks} [${this.percentage(totals.failedTasks, totals.tasks)}%]`);

    return lines.join('\n');
  }

  /**
   * Save report to file as JSON
   */
  async saveReport(report: RunReport, filePath: string): Promise<string> {
    const target = path.resolve(filePath);

    try {
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.writeFile(target, JSON.stringify(report, null, 2), 'utf8');
      this.logger.info(`Report saved to ${target}`);
      return target;
    } catch (error) {
      const message = `Failed to save report: ${errorMessage(error)}`;
      this.logger.error(message);
      throw new Error(message);
    }
  }

  /**
   * Log run start
   */
  logRunStart(taskCount: number, dryRun: boolean): void {
    this.logger.info(`Starting cleanup for ${taskCount} task(s)${dryRun ? ' in dry-run mode' : ''}`, {
      taskCount,
      dryRun
    });
  }

  /**
   * Log run completion
   */
  logRunComplete(report: RunReport): void {
    const level = report.anyFailed ? 'warn' : 'info';
    this.logger.log(level, 'Cleanup run completed', {
      ...report.totals,
      anyFailed: report.anyFailed,
      durationMs: report.durationMs
    });
  }

  /**
   * Log task start
   */
  logTaskStart(task: Task, simulated: boolean): void {
    this.logger.info(`[${task.id}] Running task for ${task.directory}`, {
      taskId: task.id,
      pattern: PatternMatcher.describe(task.pattern),
      recursive: task.recursive,
      policies: task.policies.map(policy => policy.kind),
      simulated
    });
  }

  /**
   * Log task completion
   */
  logTaskComplete(outcome: RunOutcome): void {
    const meta = {
      taskId: outcome.taskId,
      scanned: outcome.scanned,
      kept: outcome.kept,
      selected: outcome.selected.length,
      removed: outcome.removed.length,
      failures: outcome.failures.length,
      warnings: outcome.warnings.length,
      durationMs: outcome.durationMs
    };

    if (outcome.failures.length > 0) {
      outcome.failures.forEach(failure => {
        this.logger.error(`[${outcome.taskId}] ${failure.message}`, { kind: failure.kind, path: failure.path, code: failure.code });
      });
      this.logger.error(`[${outcome.taskId}] Task finished with ${outcome.failures.length} failure(s)`, meta);
    } else {
      this.logger.info(`[${outcome.taskId}] Task was successfully executed`, meta);
    }
  }

  /**
   * Log a file chosen for deletion
   */
  logFileSelected(taskId: string, eligible: EligibleFile, simulated: boolean): void {
    const verb = simulated ? 'DRY RUN: would remove' : 'Selected';
    this.logger.log(simulated ? 'info' : 'debug', `[${taskId}] ${verb} ${eligible.file.path}`, {
      size: eligible.file.size,
      modifiedAt: eligible.file.modifiedAt.toISOString(),
      reasons: eligible.reasons
    });
  }

  /**
   * Log a removal attempt
   */
  logFileRemoval(file: FileDescriptor, success: boolean, error?: string): void {
    if (success) {
      this.logger.info(`Removed ${file.path}`, { size: file.size });
    } else {
      this.logger.error(`Failed to remove ${file.path}`, { error: error || 'Unknown error' });
    }
  }

  /**
   * Log a non-fatal problem
   */
  logWarning(taskId: string, warning: TaskIssue): void {
    this.logger.warn(`[${taskId}] ${warning.message}`, {
      kind: warning.kind,
      path: warning.path,
      code: warning.code
    });
  }

  /**
   * Get logger instance for external use
   */
  getLogger(): winston.Logger {
    return this.logger;
  }

  /**
   * Setup Winston logger with console and optional file transport
   */
  private setupLogger(): void {
    const consoleTransport = new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      ),
      level: process.env.NODE_ENV === 'test' ? 'error' : this.options.level,
      stderrLevels: ['error', 'warn'],
      silent: this.options.silent === true
    });

    const fileTransport = this.options.file
      ? this.createFileTransport(this.options.file)
      : undefined;

    this.logger = winston.createLogger({
      level: 'debug',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports: fileTransport ? [consoleTransport, fileTransport] : [consoleTransport]
    });
  }

  /**
   * JSON lines to a size-rotated log file
   */
  private createFileTransport(filename: string) {
    this.ensureLogDirectorySync(path.dirname(filename));

    return new winston.transports.File({
      filename,
      level: this.options.level,
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
      tailable: true
    });
  }

  private calculateTotals(outcomes: RunOutcome[]): RunTotals {
    return outcomes.reduce<RunTotals>((totals, outcome) => ({
      tasks: totals.tasks + 1,
      failedTasks: totals.failedTasks + (outcome.failures.length > 0 ? 1 : 0),
      filesSelected: totals.filesSelected + outcome.selected.length,
      filesRemoved: totals.filesRemoved + outcome.removed.length,
      bytesSelected: totals.bytesSelected + outcome.bytesSelected,
      bytesRemoved: totals.bytesRemoved + outcome.bytesRemoved
    }), { tasks: 0, failedTasks: 0, filesSelected: 0, filesRemoved: 0, bytesSelected: 0, bytesRemoved: 0 });
  }

  private collectIssues(report: RunReport, field: 'failures' | 'warnings'): string[] {
    return report.outcomes.flatMap(outcome =>
      outcome[field].map(issue =>
        `  ${outcome.taskId}: ${issue.kind}: ${issue.message}${issue.path ? ` [${issue.path}]` : ''}`
      )
    );
  }

  private percentage(part: number, total: number): number {
    return total > 0 ? Math.floor(part * 100 / total) : 0;
  }

  /**
   * Ensure log directory exists (sync)
   */
  private ensureLogDirectorySync(dir: string): void {
    try {
      fs.accessSync(dir);
    } catch {
      fs.mkdirSync(dir, { recursive: true });
    }
  }
}
