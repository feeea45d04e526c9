import {
  AdvisorySignal,
  AuditEntry,
  AuditSummary,
  ChainVerification,
  DerivationMetadata,
  Verdict
} from '../types/core';

/**
 * Audit Matrix Interface
 * Append-only, retention-bounded record of computed advisories
 */
export interface IAuditMatrix {
  /**
   * Append one entry; evicts the oldest entry when at capacity
   */
  record(
    decisionContext: string,
    advisory: AdvisorySignal,
    verdicts: readonly Verdict[],
    derivationMetadata?: DerivationMetadata
  ): AuditEntry;

  /**
   * Seed an empty matrix with persisted entries; returns how many were retained
   */
  restore(entries: readonly AuditEntry[]): number;

  /**
   * Aggregate counts over retained entries
   */
  summarize(): AuditSummary;

  /**
   * Copies of retained entries, oldest first
   */
  snapshot(): AuditEntry[];

  /**
   * Recompute the hash chain over retained entries
   */
  verifyChain(): ChainVerification;
}
