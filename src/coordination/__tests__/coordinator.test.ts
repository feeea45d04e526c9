/**
 * Integration Coordinator Tests
 */

import { IntegrationCoordinator } from '../coordinator';
import { IVerdictAcquirer } from '../../interfaces/IVerdictAcquirer';
import { IAuditStore } from '../../interfaces/IAuditStore';
import { ConsensusAdvisor } from '../../consensus/advisor';
import { AuditMatrix } from '../../audit/matrix';
import { StateHub } from '../../state/hub';
import { AdvisoryConfig, DEFAULT_ADVISORY_CONFIG } from '../../config/advisory-config';
import {
  AcquisitionOutcome,
  AcquisitionResult,
  AdvisoryRecommendation,
  PeerAvailability,
  Verdict
} from '../../types/core';
import { makeVerdicts } from '../../__tests__/test-helpers';

const verdictOutcome = (verdict: Verdict): AcquisitionOutcome => ({
  coreName: verdict.coreName,
  url: `http://${verdict.coreName}.local`,
  kind: 'verdict',
  detail: 'ok',
  latencyMs: 5,
  verdict
});

const splitVerdicts = makeVerdicts([
  ['KayGee_1.0', 'approve', 0.94],
  ['UCM_Core_ECM', 'approve', 0.78],
  ['Caleon_Genesis_1.12', 'reject', 0.91]
]);

const splitResult: AcquisitionResult = {
  verdicts: splitVerdicts,
  outcomes: [
    ...splitVerdicts.map(verdictOutcome),
    {
      coreName: 'Cali_X_One',
      url: 'http://cali.local',
      kind: 'timeout',
      detail: 'Request timeout after 5000ms',
      latencyMs: 5000
    }
  ]
};

describe('IntegrationCoordinator', () => {
  let acquirer: jest.Mocked<IVerdictAcquirer>;
  let auditMatrix: AuditMatrix;
  let hub: StateHub;
  let config: AdvisoryConfig;

  const createCoordinator = (auditStore?: IAuditStore) =>
    new IntegrationCoordinator({
      acquirer,
      advisor: new ConsensusAdvisor(),
      auditMatrix,
      hub,
      config,
      auditStore
    });

  beforeEach(() => {
    acquirer = {
      collect: jest.fn(),
      collectDetailed: jest.fn().mockResolvedValue(splitResult)
    };
    auditMatrix = new AuditMatrix();
    hub = new StateHub();
    config = { ...DEFAULT_ADVISORY_CONFIG };
  });

  describe('advise', () => {
    it('computes, records and returns the advisory', async () => {
      const advisory = await createCoordinator().advise('deploy release');

      expect(acquirer.collectDetailed).toHaveBeenCalledWith('deploy release', 5000);
      expect(advisory.recommendation).toBe(AdvisoryRecommendation.PAUSE_AND_VERIFY);
      expect(advisory.consensusLevel).toBe(0.612);

      const [entry] = auditMatrix.snapshot();
      expect(auditMatrix.size).toBe(1);
      expect(entry.advisory).toEqual(advisory);
      expect(entry.verdictSources).toEqual(['KayGee_1.0', 'UCM_Core_ECM', 'Caleon_Genesis_1.12']);
      expect(entry.derivationMetadata).toEqual({
        verdictsUsed: 3,
        consensusCalculationMethod: 'softmax_weighted',
        outlierDetectionMethod: 'iqr',
        temperature: 1,
        timeoutMs: 5000
      });
    });

    it('updates peer availability from acquisition outcomes', async () => {
      await createCoordinator().advise('deploy release');

      const snapshot = hub.snapshot();
      expect(snapshot.peers['KayGee_1.0']).toMatchObject({
        availability: PeerAvailability.AVAILABLE,
        lastAssertion: { verdict: 'approve', confidence: 0.94, metadata: {} }
      });
      expect(snapshot.peers['Cali_X_One'].availability).toBe(PeerAvailability.UNAVAILABLE);
      expect(snapshot.divergence).toBe(true);
      expect(snapshot.events).toHaveLength(1);
      expect(snapshot.events[0]).toMatchObject({
        type: 'verdict_collection',
        decisionContext: 'deploy release',
        verdictsCollected: 3,
        endpointsQueried: 4,
        timeoutMs: 5000
      });
    });

    it('marks peers without a usable payload as silent', async () => {
      acquirer.collectDetailed.mockResolvedValue({
        verdicts: [],
        outcomes: [
          { coreName: 'Quiet', url: 'http://quiet.local', kind: 'no_usable_payload', detail: 'empty', latencyMs: 3 }
        ]
      });

      const advisory = await createCoordinator().advise('ctx');

      expect(advisory.recommendation).toBe(AdvisoryRecommendation.ESCALATE_TO_REVIEW);
      expect(advisory.consensusLevel).toBe(0);
      expect(hub.snapshot().peers.Quiet.availability).toBe(PeerAvailability.SILENT);
      expect(hub.snapshot().divergence).toBe(false);
      expect(auditMatrix.size).toBe(1);
    });

    it('persists entries when persistence is enabled', async () => {
      config.enableAuditPersistence = true;
      const store = { persist: jest.fn().mockResolvedValue(undefined), loadRecent: jest.fn() };

      await createCoordinator(store).advise('ctx');

      expect(store.persist).toHaveBeenCalledWith(auditMatrix.snapshot()[0]);
    });

    it('still returns the advisory when persistence fails', async () => {
      config.enableAuditPersistence = true;
      const store = { persist: jest.fn().mockRejectedValue(new Error('db down')), loadRecent: jest.fn() };
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

      const advisory = await createCoordinator(store).advise('ctx');

      expect(advisory.recommendation).toBe(AdvisoryRecommendation.PAUSE_AND_VERIFY);
      expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('Audit persistence failed'));
      errorSpy.mockRestore();
    });

    it('skips the store when persistence is disabled', async () => {
      const store = { persist: jest.fn(), loadRecent: jest.fn() };
      await createCoordinator(store).advise('ctx');
      expect(store.persist).not.toHaveBeenCalled();
    });
  });

  describe('interpret', () => {
    const advisor = new ConsensusAdvisor();
    const unanimous = advisor.process(
      makeVerdicts([['A', 'approve', 0.95], ['B', 'approve', 0.93], ['C', 'approve', 0.91], ['D', 'approve', 0.97]])
    );
    const split = advisor.process(splitVerdicts);
    const withOutlier = advisor.process(
      makeVerdicts([['A', 'approve', 0.9], ['B', 'approve', 0.91], ['C', 'approve', 0.89], ['D', 'approve', 0.12]])
    );

    it('maps a strong advisory to immediate execution and records a command', () => {
      const result = createCoordinator().interpret(unanimous, 'empirical rollout');

      expect(result).toEqual({
        recommendation: AdvisoryRecommendation.PROCEED,
        advisoryConfidence: 1,
        context: 'empirical rollout',
        action: 'execute_immediately',
        justification: 'High consensus across peers',
        targetPeer: 'KayGee_1.0'
      });

      const log = hub.getControlLog();
      expect(log).toHaveLength(1);
      expect(log[0].actionPayload).toMatchObject({
        source: 'consensus_advisory',
        target: 'KayGee_1.0',
        command: 'execute_immediately',
        assertionLevel: 'command',
        advisoryConsensus: 1,
        advisoryRecommendation: 'PROCEED',
        context: 'empirical rollout'
      });
    });

    it('records low-consensus recommendations as suggestions', () => {
      const result = createCoordinator().interpret(split, 'genesis migration');

      expect(result.action).toBe('defer_and_validate');
      expect(result.justification).toBe('Weak consensus (0.61), validate inputs');
      expect(hub.getControlLog()[0].actionPayload.assertionLevel).toBe('suggestion');
    });

    it('treats a consensus of exactly 0.7 as a suggestion', () => {
      createCoordinator().interpret({ ...split, consensusLevel: 0.7 }, 'ecm review');
      expect(hub.getControlLog()[0].actionPayload.assertionLevel).toBe('suggestion');
    });

    it('names the outlier in the justification', () => {
      const result = createCoordinator().interpret(withOutlier, 'plain context');

      expect(result.action).toBe('investigate_outlier');
      expect(result.justification).toBe('Statistical outlier detected: D');
      expect(result.targetPeer).toBeNull();
      expect(hub.getControlLog()).toEqual([]);
    });

    it('maps the remaining recommendations', () => {
      const coordinator = createCoordinator();
      expect(coordinator.interpret({ ...split, recommendation: AdvisoryRecommendation.PROCEED_CAUTIOUSLY }, 'x'))
        .toMatchObject({ action: 'execute_with_monitoring', justification: 'Moderate consensus, proceed with observation' });
      expect(coordinator.interpret({ ...split, recommendation: AdvisoryRecommendation.ESCALATE_TO_REVIEW }, 'x'))
        .toMatchObject({ action: 'escalate_for_manual_review', justification: 'Significant disagreement among peers' });
    });

    it('does not record control intents when attribution is disabled', () => {
      config.enableControlAttribution = false;
      const result = createCoordinator().interpret(unanimous, 'empirical rollout');

      expect(result.targetPeer).toBe('KayGee_1.0');
      expect(hub.getControlLog()).toEqual([]);
    });

    it('never contacts peers', () => {
      createCoordinator().interpret(unanimous, 'empirical rollout');
      expect(acquirer.collectDetailed).not.toHaveBeenCalled();
      expect(acquirer.collect).not.toHaveBeenCalled();
    });
  });

  describe('initialize', () => {
    it('restores retained entries from the store', async () => {
      const previous = new AuditMatrix();
      const signal = new ConsensusAdvisor().process([]);
      previous.record('a', signal, []);
      previous.record('b', signal, []);

      config.enableAuditPersistence = true;
      const store = { persist: jest.fn(), loadRecent: jest.fn().mockResolvedValue(previous.snapshot()) };

      await expect(createCoordinator(store).initialize()).resolves.toBe(2);
      expect(store.loadRecent).toHaveBeenCalledWith(1000);
      expect(auditMatrix.summarize().lastSequence).toBe(2);
    });

    it('restores the verified run after a missing row without reusing sequence numbers', async () => {
      const previous = new AuditMatrix();
      const signal = new ConsensusAdvisor().process([]);
      for (const context of ['a', 'b', 'c', 'd', 'e']) {
        previous.record(context, signal, []);
      }
      const [one, two, , four, five] = previous.snapshot();

      config.enableAuditPersistence = true;
      const store = {
        persist: jest.fn().mockResolvedValue(undefined),
        loadRecent: jest.fn().mockResolvedValue([one, two, four, five])
      };
      const coordinator = createCoordinator(store);

      await expect(coordinator.initialize()).resolves.toBe(2);
      await coordinator.advise('deploy release');

      const persisted = store.persist.mock.calls[0][0];
      expect(persisted.sequenceNumber).toBe(6);
      expect(persisted.previousHash).toBe(five.entryHash);
      expect(auditMatrix.snapshot().map((e) => e.sequenceNumber)).toEqual([4, 5, 6]);
    });

    it('starts empty when the store cannot be read', async () => {
      config.enableAuditPersistence = true;
      const store = { persist: jest.fn(), loadRecent: jest.fn().mockRejectedValue(new Error('db down')) };

      await expect(createCoordinator(store).initialize()).resolves.toBe(0);
      expect(auditMatrix.size).toBe(0);
    });

    it('does nothing without persistence', async () => {
      await expect(createCoordinator().initialize()).resolves.toBe(0);
    });
  });

  it('combines audit and hub statistics', async () => {
    const coordinator = createCoordinator();
    await coordinator.advise('deploy release');
    coordinator.interpret(auditMatrix.snapshot()[0].advisory, 'kaygee audit');

    const stats = coordinator.getAdvisoryStatistics();
    expect(stats.peerCounts).toEqual({ AVAILABLE: 3, SILENT: 0, UNAVAILABLE: 1 });
    expect(stats.audit.retained).toBe(1);
    expect(stats.audit.consensusDistribution.moderate).toBe(1);
    expect(stats.audit.recommendationCounts.PAUSE_AND_VERIFY).toBe(1);
    expect(stats.controlLogSize).toBe(1);
  });
});
