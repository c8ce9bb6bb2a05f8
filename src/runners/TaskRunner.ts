import { Evaluation, RunOutcome, ScanResult, Task, TaskIssue } from '../types';
import {
  IExecutionMode,
  IFileScanner,
  IReporter,
  IRetentionEvaluator,
  ITaskRunner
} from '../interfaces';
import { PolicyConfigError, ScanError, errorMessage } from '../errors';
import { SizeCalculator } from '../utils';

/**
 * Runs one task: scan, evaluate, then hand the selection to the execution mode.
 * Every problem ends up in the outcome; run() never rejects.
 */
export class TaskRunner implements ITaskRunner {
  private scanner: IFileScanner;
  private evaluator: IRetentionEvaluator;
  private reporter: IReporter;

  constructor(scanner: IFileScanner, evaluator: IRetentionEvaluator, reporter: IReporter) {
    this.scanner = scanner;
    this.evaluator = evaluator;
    this.reporter = reporter;
  }

  async run(task: Task, mode: IExecutionMode, now: Date): Promise<RunOutcome> {
    const startTime = Date.now();
    const outcome = this.emptyOutcome(task, mode.simulated);

    try {
      this.reporter.logTaskStart(task, mode.simulated);

      // Step 1: Scan
      const scan = await this.scan(task, outcome);
      if (!scan) {
        return this.finish(outcome, startTime);
      }
      outcome.scanned = scan.files.length;
      this.addWarnings(task, outcome, scan.warnings);

      // Step 2: Evaluate
      const evaluation = this.evaluate(task, scan, now, outcome);
      if (!evaluation) {
        return this.finish(outcome, startTime);
      }
      outcome.kept = evaluation.kept.length;
      outcome.selected = evaluation.eligible;
      outcome.bytesSelected = SizeCalculator.totalSize(evaluation.eligible.map(e => e.file));

      evaluation.eligible.forEach(eligible => this.reporter.logFileSelected(task.id, eligible, mode.simulated));

      // Step 3: Execute
      const result = await mode.decide(evaluation.eligible);
      outcome.removed = result.removed;
      outcome.bytesRemoved = SizeCalculator.totalSize(result.removed);
      outcome.failures.push(...result.failures);
      this.addWarnings(task, outcome, result.warnings);
    } catch (error) {
      outcome.failures.push({
        kind: 'unexpected',
        message: `Task failed unexpectedly: ${errorMessage(error)}`
      });
    }

    return this.finish(outcome, startTime);
  }

  /**
   * Scan the task directory; a ScanError becomes a task failure, or a warning
   * when the task tolerates a missing directory
   */
  private async scan(task: Task, outcome: RunOutcome): Promise<ScanResult | undefined> {
    try {
      return await this.scanner.collect({
        directory: task.directory,
        pattern: task.pattern,
        recursive: task.recursive
      });
    } catch (error) {
      if (!(error instanceof ScanError)) {
        throw error;
      }

      if (task.ignoreMissing && error.code === 'ENOENT') {
        this.addWarnings(task, outcome, [{
          kind: 'missing',
          path: error.path,
          code: error.code,
          message: 'Directory does not exist, missing directory is configured as okay'
        }]);
      } else {
        outcome.failures.push({
          kind: 'scan',
          path: error.path,
          code: error.code,
          message: error.message
        });
      }
      return undefined;
    }
  }

  private evaluate(task: Task, scan: ScanResult, now: Date, outcome: RunOutcome): Evaluation | undefined {
    try {
      return this.evaluator.evaluate(scan.files, task.policies, now);
    } catch (error) {
      if (!(error instanceof PolicyConfigError)) {
        throw error;
      }
      outcome.failures.push({ kind: 'policy', message: error.message });
      return undefined;
    }
  }

  private addWarnings(task: Task, outcome: RunOutcome, warnings: TaskIssue[]): void {
    warnings.forEach(warning => {
      outcome.warnings.push(warning);
      this.reporter.logWarning(task.id, warning);
    });
  }

  private finish(outcome: RunOutcome, startTime: number): RunOutcome {
    outcome.durationMs = Date.now() - startTime;
    this.reporter.logTaskComplete(outcome);
    return outcome;
  }

  private emptyOutcome(task: Task, simulated: boolean): RunOutcome {
    return {
      taskId: task.id,
      directory: task.directory,
      simulated,
      scanned: 0,
      kept: 0,
      selected: [],
      removed: [],
      failures: [],
      warnings: [],
      bytesSelected: 0,
      bytesRemoved: 0,
      durationMs: 0
    };
  }
}
