import { ActionRecommendation, AdvisorySignal, AdvisoryStatistics } from '../types/core';

/**
 * Integration Coordinator Interface
 * Runs the acquire, process and record pipeline and interprets its output
 */
export interface IIntegrationCoordinator {
  /**
   * Reload retained audit history from the durable store, if configured
   * @returns Number of entries restored
   */
  initialize(): Promise<number>;

  /**
   * Acquire verdicts, compute the advisory and record it
   */
  advise(decisionContext: string): Promise<AdvisorySignal>;

  /**
   * Translate an advisory into a recommended (not executed) action
   */
  interpret(advisory: AdvisorySignal, decisionContext: string): ActionRecommendation;

  getAdvisoryStatistics(): AdvisoryStatistics;
}
