/**
 * Core type definitions for logsweep
 */

// Selection Types
export type FilePattern =
  | { type: 'glob'; glob: string }
  | { type: 'suffix'; suffix: string };

// Retention Types
export type RetentionPolicyKind = 'maxAge' | 'maxCount' | 'maxTotalSize' | 'maxFileSize';

export interface MaxAgePolicy {
  kind: 'maxAge';
  durationMs: number;
}

export interface MaxCountPolicy {
  kind: 'maxCount';
  count: number;
}

export interface MaxTotalSizePolicy {
  kind: 'maxTotalSize';
  bytes: number;
}

export interface MaxFileSizePolicy {
  kind: 'maxFileSize';
  bytes: number;
}

export type RetentionPolicy =
  | MaxAgePolicy
  | MaxCountPolicy
  | MaxTotalSizePolicy
  | MaxFileSizePolicy;

// Task Types
export interface Task {
  readonly id: string;
  readonly directory: string;
  readonly pattern: FilePattern;
  readonly recursive: boolean;
  readonly policies: readonly RetentionPolicy[];
  readonly dryRun?: boolean;
  readonly ignoreMissing?: boolean;
}

// Scan Types
export interface FileDescriptor {
  path: string;
  name: string;
  size: number;
  modifiedAt: Date;
}

export interface ScanTarget {
  directory: string;
  pattern: FilePattern;
  recursive: boolean;
}

export interface ScanResult {
  files: FileDescriptor[];
  warnings: TaskIssue[];
}

// Evaluation Types
export interface EligibleFile {
  file: FileDescriptor;
  reasons: RetentionPolicyKind[];
}

export interface Evaluation {
  kept: FileDescriptor[];
  eligible: EligibleFile[];
}

// Issue Types
export type IssueKind =
  | 'scan'
  | 'stat'
  | 'policy'
  | 'deletion'
  | 'vanished'
  | 'missing'
  | 'unexpected';

export interface TaskIssue {
  kind: IssueKind;
  message: string;
  path?: string;
  code?: string;
}

// Result Types
export interface DeletionResult {
  simulated: boolean;
  removed: FileDescriptor[];
  failures: TaskIssue[];
  warnings: TaskIssue[];
}

export interface RunOutcome {
  taskId: string;
  directory: string;
  simulated: boolean;
  scanned: number;
  kept: number;
  selected: EligibleFile[];
  removed: FileDescriptor[];
  failures: TaskIssue[];
  warnings: TaskIssue[];
  bytesSelected: number;
  bytesRemoved: number;
  durationMs: number;
}

export interface RunTotals {
  tasks: number;
  failedTasks: number;
  filesSelected: number;
  filesRemoved: number;
  bytesSelected: number;
  bytesRemoved: number;
}

export interface RunReport {
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  dryRun: boolean;
  outcomes: RunOutcome[];
  anyFailed: boolean;
  totals: RunTotals;
}

// Configuration Types
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggingOptions {
  level: LogLevel;
  file?: string;
  silent?: boolean;
}

export interface LogSweepConfig {
  dryRun: boolean;
  logging: LoggingOptions;
  tasks: Task[];
}

// File System Types
export interface FileStats {
  size: number;
  modifiedAt: Date;
  isFile: boolean;
  isDirectory: boolean;
  isSymbolicLink: boolean;
}

export interface DirectoryEntry {
  name: string;
  isFile: boolean;
  isDirectory: boolean;
  isSymbolicLink: boolean;
}
