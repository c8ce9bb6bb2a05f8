export * from './IFileSystemClient';
export * from './IFileScanner';
export * from './IRetentionEvaluator';
export * from './IExecutionMode';
export * from './ITaskRunner';
export * from './IRunCoordinator';
export * from './IReporter';
