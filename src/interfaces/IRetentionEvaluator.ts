import { Evaluation, FileDescriptor, RetentionPolicy } from '../types';

/**
 * Interface for retention evaluation
 */
export interface IRetentionEvaluator {
  /**
   * Split matched files into kept and eligible sets
   */
  evaluate(files: readonly FileDescriptor[], policies: readonly RetentionPolicy[], now: Date): Evaluation;
}
