/**
 * Integration Coordinator
 * Runs acquire -> process -> record for a decision context and interprets the
 * resulting advisory into a recommended action. Recommendations are recorded
 * as attributed control intents in the state hub; nothing is ever dispatched.
 */

import { IIntegrationCoordinator } from '../interfaces/IIntegrationCoordinator';
import { IVerdictAcquirer } from '../interfaces/IVerdictAcquirer';
import { IConsensusAdvisor } from '../interfaces/IConsensusAdvisor';
import { IAuditMatrix } from '../interfaces/IAuditMatrix';
import { IAuditStore } from '../interfaces/IAuditStore';
import { IStateHub } from '../interfaces/IStateHub';
import { IPeerInferrer } from '../interfaces/IPeerInferrer';
import { AdvisoryConfig } from '../config/advisory-config';
import { KeywordPeerInferrer } from './peer-inferrer';
import {
  AcquisitionOutcome,
  AcquisitionOutcomeKind,
  ActionLabel,
  ActionRecommendation,
  AdvisoryRecommendation,
  AdvisorySignal,
  AdvisoryStatistics,
  AssertionLevel,
  AuditEntry,
  JsonObject,
  PeerAvailability
} from '../types/core';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { updateAdvisoryMetrics } from '../monitoring/metrics';

// Consensus above which an attributed recommendation is recorded as a command
export const COMMAND_ASSERTION_THRESHOLD = 0.7;

export const CONTROL_SOURCE = 'consensus_advisory';

export interface IntegrationCoordinatorOptions {
  acquirer: IVerdictAcquirer;
  advisor: IConsensusAdvisor;
  auditMatrix: IAuditMatrix;
  hub: IStateHub;
  config: AdvisoryConfig;
  peerInferrer?: IPeerInferrer;
  auditStore?: IAuditStore;
}

const AVAILABILITY_BY_OUTCOME: Record<AcquisitionOutcomeKind, PeerAvailability> = {
  verdict: PeerAvailability.AVAILABLE,
  non_conforming: PeerAvailability.SILENT,
  no_usable_payload: PeerAvailability.SILENT,
  http_error: PeerAvailability.UNAVAILABLE,
  unreachable: PeerAvailability.UNAVAILABLE,
  timeout: PeerAvailability.UNAVAILABLE
};

const ACTION_BY_RECOMMENDATION: Record<AdvisoryRecommendation, ActionLabel> = {
  [AdvisoryRecommendation.PROCEED]: 'execute_immediately',
  [AdvisoryRecommendation.PROCEED_CAUTIOUSLY]: 'execute_with_monitoring',
  [AdvisoryRecommendation.PAUSE_AND_VERIFY]: 'defer_and_validate',
  [AdvisoryRecommendation.ESCALATE_TO_REVIEW]: 'escalate_for_manual_review',
  [AdvisoryRecommendation.OUTLIER_INVESTIGATION]: 'investigate_outlier'
};

function justify(advisory: AdvisorySignal): string {
  switch (advisory.recommendation) {
    case AdvisoryRecommendation.PROCEED:
      return 'High consensus across peers';
    case AdvisoryRecommendation.PROCEED_CAUTIOUSLY:
      return 'Moderate consensus, proceed with observation';
    case AdvisoryRecommendation.PAUSE_AND_VERIFY:
      return `Weak consensus (${advisory.consensusLevel.toFixed(2)}), validate inputs`;
    case AdvisoryRecommendation.ESCALATE_TO_REVIEW:
      return 'Significant disagreement among peers';
    case AdvisoryRecommendation.OUTLIER_INVESTIGATION:
      return `Statistical outlier detected: ${advisory.outlierDetected ?? 'unknown'}`;
  }
}

export class IntegrationCoordinator implements IIntegrationCoordinator {
  private acquirer: IVerdictAcquirer;
  private advisor: IConsensusAdvisor;
  private auditMatrix: IAuditMatrix;
  private hub: IStateHub;
  private config: AdvisoryConfig;
  private peerInferrer: IPeerInferrer;
  private auditStore?: IAuditStore;

  constructor(options: IntegrationCoordinatorOptions) {
    this.acquirer = options.acquirer;
    this.advisor = options.advisor;
    this.auditMatrix = options.auditMatrix;
    this.hub = options.hub;
    this.config = options.config;
    this.peerInferrer = options.peerInferrer || new KeywordPeerInferrer();
    this.auditStore = options.auditStore;
  }

  /**
   * Reload recent audit entries from the durable store, when persistence is on.
   * Entries before a chain break are dropped; a failed reload is logged and
   * the matrix starts empty.
   * @returns Number of entries restored
   */
  async initialize(): Promise<number> {
    if (!this.auditStore || !this.config.enableAuditPersistence) {
      return 0;
    }
    try {
      const entries = await this.auditStore.loadRecent(this.config.auditRetention);
      const restored = this.auditMatrix.restore(entries);
      if (restored < entries.length) {
        logger.warn(`Audit chain broken; discarded ${entries.length - restored} older entries`, {
          component: 'Coordinator'
        });
      }
      logger.info(`Restored ${restored} audit entries`, { component: 'Coordinator' });
      return restored;
    } catch (error) {
      logger.error('Failed to restore audit entries', { component: 'Coordinator' }, errorMessage(error));
      return 0;
    }
  }

  async advise(decisionContext: string): Promise<AdvisorySignal> {
    const timeoutMs = this.config.verdictTimeoutMs;
    const { verdicts, outcomes } = await this.acquirer.collectDetailed(decisionContext, timeoutMs);

    for (const outcome of outcomes) {
      this.updatePeerState(outcome);
    }
    this.hub.recordEvent('verdict_collection', {
      decisionContext,
      verdictsCollected: verdicts.length,
      endpointsQueried: outcomes.length,
      timeoutMs
    });

    const advisory = this.advisor.process(verdicts);
    this.hub.setDivergence(Object.keys(advisory.verdictDistribution).length > 1);

    const entry = this.auditMatrix.record(decisionContext, advisory, verdicts, {
      verdictsUsed: verdicts.length,
      consensusCalculationMethod: 'softmax_weighted',
      outlierDetectionMethod: 'iqr',
      temperature: this.config.softmaxTemperature,
      timeoutMs
    });
    await this.persist(entry);

    updateAdvisoryMetrics({
      recommendation: advisory.recommendation,
      consensusLevel: advisory.consensusLevel
    });
    logger.advisoryComputed(decisionContext, advisory.recommendation, advisory.consensusLevel, verdicts.length);

    return advisory;
  }

  interpret(advisory: AdvisorySignal, decisionContext: string): ActionRecommendation {
    const action = ACTION_BY_RECOMMENDATION[advisory.recommendation];
    const justification = justify(advisory);
    const targetPeer = this.peerInferrer.infer(decisionContext);

    if (targetPeer && this.config.enableControlAttribution) {
      const assertionLevel: AssertionLevel =
        advisory.consensusLevel > COMMAND_ASSERTION_THRESHOLD ? 'command' : 'suggestion';
      this.hub.recordControlAction({
        source: CONTROL_SOURCE,
        target: targetPeer,
        command: action,
        justification,
        assertionLevel,
        advisoryConsensus: advisory.consensusLevel,
        advisoryRecommendation: advisory.recommendation,
        context: decisionContext
      });
    }

    return {
      recommendation: advisory.recommendation,
      advisoryConfidence: advisory.consensusLevel,
      context: decisionContext,
      action,
      justification,
      targetPeer
    };
  }

  getAdvisoryStatistics(): AdvisoryStatistics {
    const peerCounts: Record<PeerAvailability, number> = {
      [PeerAvailability.AVAILABLE]: 0,
      [PeerAvailability.SILENT]: 0,
      [PeerAvailability.UNAVAILABLE]: 0
    };
    for (const peer of Object.values(this.hub.snapshot().peers)) {
      peerCounts[peer.availability]++;
    }

    return {
      audit: this.auditMatrix.summarize(),
      peerCounts,
      controlLogSize: this.hub.getControlLog().length
    };
  }

  private updatePeerState(outcome: AcquisitionOutcome): void {
    const availability = AVAILABILITY_BY_OUTCOME[outcome.kind];
    if (!outcome.verdict) {
      this.hub.updatePeerAvailability(outcome.coreName, availability);
      return;
    }

    const assertion: JsonObject = {
      verdict: outcome.verdict.verdict,
      confidence: outcome.verdict.confidence,
      metadata: { ...outcome.verdict.metadata }
    };
    this.hub.updatePeerAvailability(outcome.verdict.coreName, availability, assertion);
  }

  private async persist(entry: AuditEntry): Promise<void> {
    if (!this.auditStore || !this.config.enableAuditPersistence) {
      return;
    }
    try {
      await this.auditStore.persist(entry);
    } catch (error) {
      logger.error('Audit persistence failed; advisory still returned', {
        decisionContext: entry.decisionContext,
        component: 'Coordinator'
      }, errorMessage(error));
    }
  }
}
