import { RunReport } from '../types';

export const EXIT_SUCCESS = 0;

/** At least one task or file failed */
export const EXIT_TASK_FAILURES = 1;

/** Configuration missing or invalid, or nothing to run */
export const EXIT_CANNOT_START = 2;

export function exitCodeFor(report: RunReport): number {
  return report.anyFailed ? EXIT_TASK_FAILURES : EXIT_SUCCESS;
}
