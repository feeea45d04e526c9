import { AdvisorySignal, Verdict } from '../types/core';

/**
 * Consensus Advisor Interface
 * Pure aggregation of verdicts into an advisory signal
 */
export interface IConsensusAdvisor {
  /**
   * Compute an advisory; identical ordered inputs give identical signals
   */
  process(verdicts: readonly Verdict[]): AdvisorySignal;
}
