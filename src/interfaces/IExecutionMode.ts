import { DeletionResult, EligibleFile } from '../types';

/**
 * Interface shared by the simulate and apply execution modes
 */
export interface IExecutionMode {
  readonly simulated: boolean;

  /**
   * Act on the files selected for deletion
   */
  decide(eligible: readonly EligibleFile[]): Promise<DeletionResult>;
}
