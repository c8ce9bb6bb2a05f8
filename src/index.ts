export * from './types';
export * from './interfaces';
export * from './errors';
export { FileSystemClient } from './clients/FileSystemClient';
export { FileScanner } from './scanners/FileScanner';
export { RetentionEvaluator, newestFirst, oldestFirst } from './evaluators/RetentionEvaluator';
export { ApplyMode, SimulateMode, createExecutionMode } from './executors/ExecutionModes';
export { TaskRunner } from './runners/TaskRunner';
export { RunCoordinator } from './orchestrators/RunCoordinator';
export type { ExecutionModes } from './orchestrators/RunCoordinator';
export { Reporter } from './reporters/Reporter';
export { DEFAULT_CONFIG_PATH, initConfig, loadConfig, validateConfig } from './config';
export { EXIT_CANNOT_START, EXIT_SUCCESS, EXIT_TASK_FAILURES, exitCodeFor } from './cli/exitCodes';
