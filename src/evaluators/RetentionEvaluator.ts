import {
  EligibleFile,
  Evaluation,
  FileDescriptor,
  RetentionPolicy,
  RetentionPolicyKind
} from '../types';
import { IRetentionEvaluator } from '../interfaces';
import { PolicyConfigError } from '../errors';

/**
 * Newest first; equal modification times fall back to path order
 */
export function newestFirst(a: FileDescriptor, b: FileDescriptor): number {
  const byTime = b.modifiedAt.getTime() - a.modifiedAt.getTime();
  if (byTime !== 0) return byTime;
  return comparePaths(a.path, b.path);
}

/**
 * Oldest first; equal modification times fall back to path order
 */
export function oldestFirst(a: FileDescriptor, b: FileDescriptor): number {
  const byTime = a.modifiedAt.getTime() - b.modifiedAt.getTime();
  if (byTime !== 0) return byTime;
  return comparePaths(a.path, b.path);
}

function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Retention evaluator
 * Decides which matched files a task's policies make eligible for deletion.
 *
 * Policies combine as a union: a file is eligible as soon as ANY policy marks it,
 * even if every other policy would keep it.
 */
export class RetentionEvaluator implements IRetentionEvaluator {
  /**
   * Split files into kept (newest first) and eligible (oldest first, with the
   * kinds of the policies that selected each file)
   */
  evaluate(files: readonly FileDescriptor[], policies: readonly RetentionPolicy[], now: Date): Evaluation {
    policies.forEach((policy, index) => RetentionEvaluator.assertValidPolicy(policy, index));

    const nowMs = now.getTime();
    if (!Number.isFinite(nowMs)) {
      throw new PolicyConfigError('Reference time for retention evaluation is not a valid date');
    }

    const ordered = RetentionEvaluator.uniqueByPath(files).sort(newestFirst);
    const reasons = new Map<string, RetentionPolicyKind[]>();

    for (const policy of policies) {
      for (const file of RetentionEvaluator.selectByPolicy(ordered, policy, nowMs)) {
        const fileReasons = reasons.get(file.path) ?? [];
        if (!fileReasons.includes(policy.kind)) {
          fileReasons.push(policy.kind);
        }
        reasons.set(file.path, fileReasons);
      }
    }

    const kept = ordered.filter(file => !reasons.has(file.path));
    const eligible: EligibleFile[] = ordered
      .filter(file => reasons.has(file.path))
      .sort(oldestFirst)
      .map(file => ({ file, reasons: reasons.get(file.path) ?? [] }));

    return { kept, eligible };
  }

  /**
   * Files a single policy marks eligible, given files in newest-first order
   */
  static selectByPolicy(ordered: readonly FileDescriptor[], policy: RetentionPolicy, nowMs: number): FileDescriptor[] {
    switch (policy.kind) {
    case 'maxAge':
      // Exactly at the boundary is still kept
      return ordered.filter(file => nowMs - file.modifiedAt.getTime() > policy.durationMs);

    case 'maxCount':
      return ordered.slice(policy.count);

    case 'maxTotalSize': {
      // A zero budget keeps nothing, empty files included
      if (policy.bytes === 0) {
        return [...ordered];
      }
      let cumulative = 0;
      const firstOver = ordered.findIndex(file => {
        cumulative += file.size;
        return cumulative > policy.bytes;
      });
      // Once the budget is exceeded every older file goes too
      return firstOver === -1 ? [] : ordered.slice(firstOver);
    }

    case 'maxFileSize':
      return ordered.filter(file => file.size > policy.bytes);

    default:
      return RetentionEvaluator.unknownPolicy(policy);
    }
  }

  /**
   * Reject malformed thresholds instead of guessing what was meant
   */
  static assertValidPolicy(policy: RetentionPolicy, index: number): void {
    const where = `Retention policy #${index + 1} (${policy.kind})`;

    switch (policy.kind) {
    case 'maxAge':
      assertNonNegative(policy.durationMs, `${where} duration`);
      return;
    case 'maxCount':
      assertNonNegative(policy.count, `${where} count`);
      if (!Number.isInteger(policy.count)) {
        throw new PolicyConfigError(`${where} count must be a whole number, got ${policy.count}`);
      }
      return;
    case 'maxTotalSize':
    case 'maxFileSize':
      assertNonNegative(policy.bytes, `${where} size`);
      return;
    default:
      RetentionEvaluator.unknownPolicy(policy);
    }
  }

  private static unknownPolicy(policy: never): never {
    throw new PolicyConfigError(`Unknown retention policy: ${JSON.stringify(policy)}`);
  }

  /**
   * The same path scanned twice is evaluated once
   */
  private static uniqueByPath(files: readonly FileDescriptor[]): FileDescriptor[] {
    const seen = new Set<string>();
    return files.filter(file => {
      if (seen.has(file.path)) return false;
      seen.add(file.path);
      return true;
    });
  }
}

function assertNonNegative(value: number, label: string): void {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new PolicyConfigError(`${label} must be a non-negative number, got ${String(value)}`);
  }
}
