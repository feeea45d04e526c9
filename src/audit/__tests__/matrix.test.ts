/**
 * Audit Matrix Tests
 */

import { AuditMatrix, GENESIS_HASH, consensusBucket, verifyAuditChain } from '../matrix';
import { AdvisoryRecommendation, AdvisorySignal } from '../../types/core';
import { ConfigurationError } from '../../utils/errors';
import { makeVerdicts } from '../../__tests__/test-helpers';

function makeSignal(consensusLevel: number, recommendation: AdvisoryRecommendation): AdvisorySignal {
  return {
    dominantVerdict: 'approve',
    softmaxProbabilities: [{ coreName: 'A', probability: 1 }],
    outlierDetected: null,
    confidenceClustering: 'strong',
    consensusLevel,
    recommendation,
    rawConfidences: [0.9],
    verdictDistribution: { approve: 1 },
    effectiveEntropy: 0,
    advisoryExplanation: 'test'
  };
}

const verdicts = makeVerdicts([['KayGee_1.0', 'approve', 0.9], ['UCM_Core_ECM', 'approve', 0.8]]);
const fixedClock = () => new Date('2026-01-01T00:00:00.000Z');

describe('AuditMatrix', () => {
  it('records entries with sequence numbers and a hash chain', () => {
    const matrix = new AuditMatrix({ clock: fixedClock });
    const first = matrix.record('ctx-1', makeSignal(0.95, AdvisoryRecommendation.PROCEED), verdicts, {
      verdictsUsed: 2
    });
    const second = matrix.record('ctx-2', makeSignal(0.5, AdvisoryRecommendation.ESCALATE_TO_REVIEW), []);

    expect(first.sequenceNumber).toBe(1);
    expect(first.timestamp).toBe('2026-01-01T00:00:00.000Z');
    expect(first.previousHash).toBe(GENESIS_HASH);
    expect(first.entryHash).toMatch(/^[0-9a-f]{64}$/);
    expect(first.verdictSources).toEqual(['KayGee_1.0', 'UCM_Core_ECM']);
    expect(first.derivationMetadata).toEqual({ verdictsUsed: 2 });

    expect(second.sequenceNumber).toBe(2);
    expect(second.previousHash).toBe(first.entryHash);
    expect(second.derivationMetadata).toEqual({});
    expect(matrix.verifyChain()).toEqual({ ok: true, firstBadSequence: null });
  });

  it('returns frozen entries and independent snapshots', () => {
    const matrix = new AuditMatrix();
    const entry = matrix.record('ctx', makeSignal(0.8, AdvisoryRecommendation.PROCEED_CAUTIOUSLY), verdicts);

    expect(Object.isFrozen(entry)).toBe(true);
    expect(Object.isFrozen(entry.advisory)).toBe(true);

    const [copy] = matrix.snapshot();
    expect(copy).toEqual(entry);
    expect(copy).not.toBe(entry);
  });

  it('evicts the oldest entries beyond capacity', () => {
    const matrix = new AuditMatrix({ capacity: 3 });
    for (let i = 1; i <= 5; i++) {
      matrix.record(`ctx-${i}`, makeSignal(0.9, AdvisoryRecommendation.PROCEED), verdicts);
    }

    expect(matrix.size).toBe(3);
    expect(matrix.capacity).toBe(3);
    expect(matrix.snapshot().map((e) => e.sequenceNumber)).toEqual([3, 4, 5]);
    expect(matrix.verifyChain().ok).toBe(true);

    const summary = matrix.summarize();
    expect(summary.totalRecorded).toBe(5);
    expect(summary.retained).toBe(3);
    expect(summary.lastSequence).toBe(5);
  });

  it('detects tampering in a copy of the chain', () => {
    const matrix = new AuditMatrix();
    for (let i = 1; i <= 3; i++) {
      matrix.record(`ctx-${i}`, makeSignal(0.9, AdvisoryRecommendation.PROCEED), verdicts);
    }

    const entries = matrix.snapshot();
    entries[1] = { ...entries[1], decisionContext: 'rewritten' };
    expect(verifyAuditChain(entries)).toEqual({ ok: false, firstBadSequence: 2 });

    const relinked = matrix.snapshot();
    relinked[2] = { ...relinked[2], previousHash: GENESIS_HASH };
    expect(verifyAuditChain(relinked)).toEqual({ ok: false, firstBadSequence: 3 });
  });

  it('summarizes consensus buckets and recommendations', () => {
    const matrix = new AuditMatrix();
    matrix.record('a', makeSignal(0.95, AdvisoryRecommendation.PROCEED), verdicts);
    matrix.record('b', makeSignal(0.8, AdvisoryRecommendation.PROCEED_CAUTIOUSLY), verdicts);
    matrix.record('c', makeSignal(0.65, AdvisoryRecommendation.PAUSE_AND_VERIFY), verdicts);
    matrix.record('d', makeSignal(0.45, AdvisoryRecommendation.ESCALATE_TO_REVIEW), verdicts);
    matrix.record('e', makeSignal(0.1, AdvisoryRecommendation.ESCALATE_TO_REVIEW), verdicts);

    expect(matrix.summarize()).toEqual({
      consensusDistribution: { unanimous: 1, strong: 1, moderate: 1, fragmented: 1, conflicted: 1 },
      recommendationCounts: {
        PROCEED: 1,
        PROCEED_CAUTIOUSLY: 1,
        PAUSE_AND_VERIFY: 1,
        ESCALATE_TO_REVIEW: 2,
        OUTLIER_INVESTIGATION: 0
      },
      totalRecorded: 5,
      retained: 5,
      lastSequence: 5
    });
  });

  it('restores persisted entries and continues the chain', () => {
    const source = new AuditMatrix();
    source.record('a', makeSignal(0.9, AdvisoryRecommendation.PROCEED), verdicts);
    source.record('b', makeSignal(0.9, AdvisoryRecommendation.PROCEED), verdicts);

    const restored = new AuditMatrix();
    restored.restore(source.snapshot());
    const next = restored.record('c', makeSignal(0.9, AdvisoryRecommendation.PROCEED), verdicts);

    expect(next.sequenceNumber).toBe(3);
    expect(next.previousHash).toBe(source.snapshot()[1].entryHash);
    expect(restored.verifyChain().ok).toBe(true);
  });

  it('refuses to restore into a used matrix', () => {
    const source = new AuditMatrix();
    source.record('a', makeSignal(0.9, AdvisoryRecommendation.PROCEED), verdicts);

    expect(() => source.restore(source.snapshot())).toThrow('Audit matrix can only be restored while empty');
  });

  it('keeps the verified run after a gap and continues numbering past it', () => {
    const source = new AuditMatrix();
    for (const context of ['a', 'b', 'c', 'd', 'e']) {
      source.record(context, makeSignal(0.9, AdvisoryRecommendation.PROCEED), verdicts);
    }
    const [one, two, , four, five] = source.snapshot();

    const restored = new AuditMatrix();
    expect(restored.restore([five, one, four, two])).toBe(2);
    expect(restored.snapshot().map((e) => e.sequenceNumber)).toEqual([4, 5]);

    const next = restored.record('f', makeSignal(0.9, AdvisoryRecommendation.PROCEED), verdicts);
    expect(next.sequenceNumber).toBe(6);
    expect(next.previousHash).toBe(five.entryHash);
    expect(restored.verifyChain().ok).toBe(true);
  });

  it('retains nothing but still continues numbering when the newest entry is altered', () => {
    const source = new AuditMatrix();
    source.record('a', makeSignal(0.9, AdvisoryRecommendation.PROCEED), verdicts);
    source.record('b', makeSignal(0.9, AdvisoryRecommendation.PROCEED), verdicts);
    const [one, two] = source.snapshot();

    const restored = new AuditMatrix();
    expect(restored.restore([one, { ...two, decisionContext: 'edited' }])).toBe(0);
    expect(restored.size).toBe(0);
    expect(restored.record('c', makeSignal(0.9, AdvisoryRecommendation.PROCEED), verdicts).sequenceNumber).toBe(3);
  });

  it('restores at most capacity entries', () => {
    const source = new AuditMatrix();
    for (const context of ['a', 'b', 'c']) {
      source.record(context, makeSignal(0.9, AdvisoryRecommendation.PROCEED), verdicts);
    }

    const restored = new AuditMatrix({ capacity: 2 });
    expect(restored.restore(source.snapshot())).toBe(2);
    expect(restored.snapshot().map((e) => e.sequenceNumber)).toEqual([2, 3]);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new AuditMatrix({ capacity: 0 })).toThrow(ConfigurationError);
  });
});

describe('consensusBucket', () => {
  it('uses inclusive lower bounds', () => {
    expect(consensusBucket(0.9)).toBe('unanimous');
    expect(consensusBucket(0.75)).toBe('strong');
    expect(consensusBucket(0.6)).toBe('moderate');
    expect(consensusBucket(0.4)).toBe('fragmented');
    expect(consensusBucket(0.3999)).toBe('conflicted');
  });
});
