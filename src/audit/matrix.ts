/**
 * Audit Matrix
 * Append-only, retention-bounded record of computed advisories.
 * Entries are chained by SHA-256 hashes so later edits are detectable;
 * the oldest entry is evicted once the capacity is reached.
 */

import { createHash, randomUUID } from 'crypto';
import { IAuditMatrix } from '../interfaces/IAuditMatrix';
import {
  AdvisoryRecommendation,
  AdvisorySignal,
  AuditEntry,
  AuditSummary,
  ChainVerification,
  ConsensusBucket,
  DerivationMetadata,
  Verdict
} from '../types/core';
import { ConfigurationError } from '../utils/errors';
import { canonicalJson, deepFreeze } from '../utils/json';

export const DEFAULT_AUDIT_CAPACITY = 1000;
export const GENESIS_HASH = '0'.repeat(64);

export interface AuditMatrixOptions {
  capacity?: number;
  clock?: () => Date;
}

/**
 * Bucket a consensus level for summaries
 */
export function consensusBucket(consensusLevel: number): ConsensusBucket {
  if (consensusLevel >= 0.9) {return 'unanimous';}
  if (consensusLevel >= 0.75) {return 'strong';}
  if (consensusLevel >= 0.6) {return 'moderate';}
  if (consensusLevel >= 0.4) {return 'fragmented';}
  return 'conflicted';
}

/**
 * SHA-256 over the canonical JSON of every field except the hash itself
 */
export function computeEntryHash(entry: Omit<AuditEntry, 'entryHash'>): string {
  const hashed = {
    entryId: entry.entryId,
    sequenceNumber: entry.sequenceNumber,
    timestamp: entry.timestamp,
    decisionContext: entry.decisionContext,
    advisory: entry.advisory,
    verdictSources: entry.verdictSources,
    derivationMetadata: entry.derivationMetadata,
    previousHash: entry.previousHash
  };
  return createHash('sha256').update(canonicalJson(hashed), 'utf8').digest('hex');
}

/**
 * Verify hashes and links of consecutive entries. The first entry's
 * predecessor may have been evicted, so only its own hash is checked.
 */
export function verifyAuditChain(entries: readonly AuditEntry[]): ChainVerification {
  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    const linked = i === 0 || entry.previousHash === entries[i - 1].entryHash;
    if (!linked || computeEntryHash(entry) !== entry.entryHash) {
      return { ok: false, firstBadSequence: entry.sequenceNumber };
    }
  }
  return { ok: true, firstBadSequence: null };
}

function emptyConsensusDistribution(): Record<ConsensusBucket, number> {
  return { unanimous: 0, strong: 0, moderate: 0, fragmented: 0, conflicted: 0 };
}

function emptyRecommendationCounts(): Record<AdvisoryRecommendation, number> {
  return {
    [AdvisoryRecommendation.PROCEED]: 0,
    [AdvisoryRecommendation.PROCEED_CAUTIOUSLY]: 0,
    [AdvisoryRecommendation.PAUSE_AND_VERIFY]: 0,
    [AdvisoryRecommendation.ESCALATE_TO_REVIEW]: 0,
    [AdvisoryRecommendation.OUTLIER_INVESTIGATION]: 0
  };
}

export class AuditMatrix implements IAuditMatrix {
  private readonly entries: AuditEntry[] = [];
  private readonly maxEntries: number;
  private readonly clock: () => Date;
  private lastSequence = 0;
  private lastHash = GENESIS_HASH;

  constructor(options: AuditMatrixOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_AUDIT_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ConfigurationError('auditRetention', `must be a positive integer, got ${capacity}`);
    }
    this.maxEntries = capacity;
    this.clock = options.clock ?? (() => new Date());
  }

  get size(): number {
    return this.entries.length;
  }

  get capacity(): number {
    return this.maxEntries;
  }

  record(
    decisionContext: string,
    advisory: AdvisorySignal,
    verdicts: readonly Verdict[],
    derivationMetadata: DerivationMetadata = {}
  ): AuditEntry {
    const fields: Omit<AuditEntry, 'entryHash'> = {
      entryId: randomUUID(),
      sequenceNumber: this.lastSequence + 1,
      timestamp: this.clock().toISOString(),
      decisionContext,
      advisory: structuredClone(advisory),
      verdictSources: verdicts.map((v) => v.coreName),
      derivationMetadata: structuredClone(derivationMetadata),
      previousHash: this.lastHash
    };
    const entry = deepFreeze({ ...fields, entryHash: computeEntryHash(fields) });

    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
    this.lastSequence = entry.sequenceNumber;
    this.lastHash = entry.entryHash;

    return entry;
  }

  /**
   * Seed an empty matrix with previously persisted entries. Entries are put in
   * sequence order and only the longest verified run ending at the newest one
   * is retained (at most `capacity`). Numbering always continues after the
   * highest persisted sequence, even when nothing verifies.
   * @returns Number of entries retained
   */
  restore(entries: readonly AuditEntry[]): number {
    if (this.entries.length > 0 || this.lastSequence > 0) {
      throw new Error('Audit matrix can only be restored while empty');
    }
    const ordered = [...entries].sort((a, b) => a.sequenceNumber - b.sequenceNumber);
    const newest = ordered[ordered.length - 1];
    if (!newest) {
      return 0;
    }

    let start = ordered.length;
    if (computeEntryHash(newest) === newest.entryHash) {
      start = ordered.length - 1;
      while (start > ordered.length - this.maxEntries && start > 0) {
        const candidate = ordered[start - 1];
        const successor = ordered[start];
        const linked =
          successor.sequenceNumber === candidate.sequenceNumber + 1 &&
          successor.previousHash === candidate.entryHash &&
          computeEntryHash(candidate) === candidate.entryHash;
        if (!linked) {
          break;
        }
        start--;
      }
    }

    for (const entry of ordered.slice(start)) {
      this.entries.push(deepFreeze(structuredClone(entry)));
    }
    this.lastSequence = newest.sequenceNumber;
    this.lastHash = newest.entryHash;
    return this.entries.length;
  }

  summarize(): AuditSummary {
    const consensusDistribution = emptyConsensusDistribution();
    const recommendationCounts = emptyRecommendationCounts();

    for (const entry of this.entries) {
      consensusDistribution[consensusBucket(entry.advisory.consensusLevel)]++;
      recommendationCounts[entry.advisory.recommendation]++;
    }

    return {
      consensusDistribution,
      recommendationCounts,
      totalRecorded: this.lastSequence,
      retained: this.entries.length,
      lastSequence: this.lastSequence
    };
  }

  snapshot(): AuditEntry[] {
    return this.entries.map((entry) => structuredClone(entry));
  }

  verifyChain(): ChainVerification {
    return verifyAuditChain(this.entries);
  }
}
