import { AcquisitionResult, Verdict } from '../types/core';

/**
 * Verdict Acquirer Interface
 * Fans a decision context out to every discovered peer and collects verdicts
 */
export interface IVerdictAcquirer {
  /**
   * Collect normalized verdicts; never rejects
   * @param decisionContext - Opaque string the peers assert about
   * @param timeoutMs - Per-endpoint request timeout
   */
  collect(decisionContext: string, timeoutMs?: number): Promise<Verdict[]>;

  /**
   * Collect verdicts together with the per-endpoint outcome classification
   */
  collectDetailed(decisionContext: string, timeoutMs?: number): Promise<AcquisitionResult>;
}
