/**
 * Configuration validation
 */

import * as path from 'path';
import { FilePattern, LogLevel, LogSweepConfig, RetentionPolicy, Task } from '../types';
import { ConfigError, errorMessage } from '../errors';
import { PatternMatcher, SizeCalculator, parseDuration } from '../utils';

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];
const TASK_KEYS = ['id', 'directory', 'pattern', 'suffix', 'recursive', 'dryRun', 'ignoreMissing', 'retention'];
const RETENTION_KEYS = ['maxAge', 'maxCount', 'maxTotalSize', 'maxFileSize'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed config document and build the immutable task list.
 * Every problem found is reported at once.
 */
export function validateConfig(raw: unknown): LogSweepConfig {
  const problems: string[] = [];

  if (!isRecord(raw)) {
    throw new ConfigError('Invalid configuration', ['config must be an object with a \'tasks\' list']);
  }

  const dryRun = optionalBoolean(raw.dryRun, 'dryRun', problems) ?? false;
  const logging = validateLogging(raw.logging, problems);
  const tasks = validateTasks(raw.tasks, problems);

  if (problems.length > 0) {
    throw new ConfigError('Invalid configuration', problems);
  }

  return { dryRun, logging, tasks };
}

function validateLogging(value: unknown, problems: string[]): LogSweepConfig['logging'] {
  if (value === undefined) {
    return { level: 'info' };
  }
  if (!isRecord(value)) {
    problems.push('logging must be an object');
    return { level: 'info' };
  }

  let level: LogLevel = 'info';
  if (value.level !== undefined) {
    const match = LOG_LEVELS.find(candidate => candidate === value.level);
    if (match) {
      level = match;
    } else {
      problems.push(`logging.level must be one of: ${LOG_LEVELS.join(', ')}`);
    }
  }

  if (value.file !== undefined && (typeof value.file !== 'string' || value.file.trim() === '')) {
    problems.push('logging.file must be a non-empty string');
    return { level };
  }

  return typeof value.file === 'string' ? { level, file: value.file } : { level };
}

function validateTasks(value: unknown, problems: string[]): Task[] {
  if (!Array.isArray(value) || value.length === 0) {
    problems.push('tasks must be a non-empty list');
    return [];
  }

  const tasks: Task[] = [];
  const seenIds = new Set<string>();

  value.forEach((entry: unknown, index) => {
    const task = validateTask(entry, `tasks[${index}]`, problems);
    if (!task) return;

    if (seenIds.has(task.id)) {
      problems.push(`tasks[${index}].id '${task.id}' is used by more than one task`);
      return;
    }
    seenIds.add(task.id);
    tasks.push(task);
  });

  return tasks;
}

function validateTask(entry: unknown, where: string, problems: string[]): Task | undefined {
  if (!isRecord(entry)) {
    problems.push(`${where} must be an object`);
    return undefined;
  }

  const before = problems.length;

  Object.keys(entry)
    .filter(key => !TASK_KEYS.includes(key))
    .forEach(key => problems.push(`${where}.${key} is not a known task setting`));

  const id = requiredString(entry.id, `${where}.id`, problems);

  const directory = requiredString(entry.directory, `${where}.directory`, problems);
  if (directory !== undefined && !path.isAbsolute(directory)) {
    problems.push(`${where}.directory must be an absolute path`);
  }

  const pattern = validatePattern(entry, where, problems);
  const recursive = optionalBoolean(entry.recursive, `${where}.recursive`, problems) ?? false;
  const dryRun = optionalBoolean(entry.dryRun, `${where}.dryRun`, problems);
  const ignoreMissing = optionalBoolean(entry.ignoreMissing, `${where}.ignoreMissing`, problems);
  const policies = validateRetention(entry.retention, `${where}.retention`, problems);

  if (problems.length > before || id === undefined || directory === undefined || pattern === undefined) {
    return undefined;
  }

  return Object.freeze({
    id,
    directory: path.normalize(directory),
    pattern,
    recursive,
    policies: Object.freeze(policies),
    ...(dryRun !== undefined ? { dryRun } : {}),
    ...(ignoreMissing !== undefined ? { ignoreMissing } : {})
  });
}

function validatePattern(entry: Record<string, unknown>, where: string, problems: string[]): FilePattern | undefined {
  if (entry.pattern !== undefined && entry.suffix !== undefined) {
    problems.push(`${where} must set either 'pattern' or 'suffix', not both`);
    return undefined;
  }

  if (entry.suffix !== undefined) {
    const suffix = requiredString(entry.suffix, `${where}.suffix`, problems);
    return suffix === undefined ? undefined : { type: 'suffix', suffix };
  }

  if (entry.pattern === undefined) {
    problems.push(`${where} must set a file 'pattern' (glob) or 'suffix'`);
    return undefined;
  }

  const glob = requiredString(entry.pattern, `${where}.pattern`, problems);
  if (glob !== undefined && glob.includes('/')) {
    problems.push(`${where}.pattern is matched against file names and cannot contain '/'`);
    return undefined;
  }
  if (glob === undefined) {
    return undefined;
  }

  try {
    PatternMatcher.globToRegex(glob);
  } catch (error) {
    problems.push(`${where}.pattern '${glob}' is not a valid glob: ${errorMessage(error)}`);
    return undefined;
  }
  return { type: 'glob', glob };
}

/**
 * Retention keys become policies in the order they are written
 */
function validateRetention(value: unknown, where: string, problems: string[]): RetentionPolicy[] {
  if (!isRecord(value) || Object.keys(value).length === 0) {
    problems.push(`${where} must set at least one of: ${RETENTION_KEYS.join(', ')}`);
    return [];
  }

  const policies: RetentionPolicy[] = [];

  for (const [key, threshold] of Object.entries(value)) {
    switch (key) {
    case 'maxAge': {
      const durationMs = typeof threshold === 'number' || typeof threshold === 'string'
        ? parseDuration(threshold)
        : undefined;
      if (durationMs === undefined) {
        problems.push(`${where}.maxAge must be a duration such as 3600, "12h", "14d" or "2w"`);
      } else {
        policies.push({ kind: 'maxAge', durationMs });
      }
      break;
    }
    case 'maxCount':
      if (typeof threshold !== 'number' || !Number.isInteger(threshold) || threshold < 0) {
        problems.push(`${where}.maxCount must be a non-negative whole number`);
      } else {
        policies.push({ kind: 'maxCount', count: threshold });
      }
      break;
    case 'maxTotalSize':
    case 'maxFileSize': {
      const bytes = typeof threshold === 'number' || typeof threshold === 'string'
        ? SizeCalculator.parseSize(threshold)
        : undefined;
      if (bytes === undefined) {
        problems.push(`${where}.${key} must be a size such as 1048576, "500KB" or "1.5GB"`);
      } else {
        policies.push({ kind: key, bytes });
      }
      break;
    }
    default:
      problems.push(`${where}.${key} is not a known retention policy (use ${RETENTION_KEYS.join(', ')})`);
    }
  }

  return policies;
}

function requiredString(value: unknown, where: string, problems: string[]): string | undefined {
  if (typeof value !== 'string' || value.trim() === '') {
    problems.push(`${where} must be a non-empty string`);
    return undefined;
  }
  return value;
}

function optionalBoolean(value: unknown, where: string, problems: string[]): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    problems.push(`${where} must be true or false`);
    return undefined;
  }
  return value;
}
