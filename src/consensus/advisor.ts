/**
 * SoftMax Consensus Advisor
 * Stateless, deterministic aggregation of peer verdicts into an advisory signal.
 * Purely advisory: it never overrides a decision and keeps no history.
 */

import { IConsensusAdvisor } from '../interfaces/IConsensusAdvisor';
import {
  AdvisoryRecommendation,
  AdvisorySignal,
  ConfidenceClustering,
  Verdict
} from '../types/core';
import { ConfigurationError } from '../utils/errors';
import { deepFreeze } from '../utils/json';
import { detectOutlier } from './outlier-detector';
import { argmax, normalizedEntropy, round, softmax } from './statistics';

export const MAX_EXPLANATION_LENGTH = 300;

/**
 * Consensus level thresholds for recommendations
 */
export const RECOMMENDATION_THRESHOLDS = {
  PROCEED: 0.9,
  PROCEED_CAUTIOUSLY: 0.75,
  PAUSE_AND_VERIFY: 0.6,
  OUTLIER_INVESTIGATION: 0.8
} as const;

// Weights of dominant softmax mass, agreement rate and (1 - entropy)
const CONSENSUS_WEIGHTS = { mass: 0.4, agreement: 0.4, certainty: 0.2 } as const;

const FLOAT_TOLERANCE = 1e-9;

export interface ConsensusAdvisorOptions {
  temperature?: number;
  minimumQuorum?: number;
}

interface CohesionMetrics {
  agreement: number;
  spread: number;
}

interface ClusteringRule {
  bucket: ConfidenceClustering;
  applies(metrics: CohesionMetrics): boolean;
}

const within = (value: number, limit: number): boolean => value <= limit + FLOAT_TOLERANCE;

/**
 * Ordered clustering rules; the first rule that applies names the bucket
 */
export const CLUSTERING_RULES: readonly ClusteringRule[] = [
  { bucket: 'unanimous', applies: ({ agreement, spread }) => agreement === 1 && within(spread, 0.1) },
  { bucket: 'strong', applies: ({ agreement, spread }) => agreement >= 0.75 && within(spread, 0.25) },
  { bucket: 'conflicted', applies: ({ agreement, spread }) => agreement < 0.75 && within(spread, 0.2) },
  {
    bucket: 'moderate',
    applies: ({ agreement, spread }) => agreement >= 0.75 || (agreement >= 0.5 && within(spread, 0.5))
  },
  { bucket: 'fragmented', applies: () => true }
];

export function classifyClustering(metrics: CohesionMetrics): ConfidenceClustering {
  const rule = CLUSTERING_RULES.find((candidate) => candidate.applies(metrics));
  return rule ? rule.bucket : 'fragmented';
}

/**
 * Map a consensus level and outlier flag to a recommendation.
 * Nothing else influences the outcome.
 */
export function recommend(consensusLevel: number, outlierDetected: string | null): AdvisoryRecommendation {
  if (outlierDetected !== null && consensusLevel >= RECOMMENDATION_THRESHOLDS.OUTLIER_INVESTIGATION) {
    return AdvisoryRecommendation.OUTLIER_INVESTIGATION;
  }
  if (consensusLevel >= RECOMMENDATION_THRESHOLDS.PROCEED) {
    return AdvisoryRecommendation.PROCEED;
  }
  if (consensusLevel >= RECOMMENDATION_THRESHOLDS.PROCEED_CAUTIOUSLY) {
    return AdvisoryRecommendation.PROCEED_CAUTIOUSLY;
  }
  if (consensusLevel >= RECOMMENDATION_THRESHOLDS.PAUSE_AND_VERIFY) {
    return AdvisoryRecommendation.PAUSE_AND_VERIFY;
  }
  return AdvisoryRecommendation.ESCALATE_TO_REVIEW;
}

function sanitizeConfidence(value: number): number {
  if (!isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.min(1, value));
}

export class ConsensusAdvisor implements IConsensusAdvisor {
  private readonly temperature: number;
  private readonly minimumQuorum: number;

  constructor(options: ConsensusAdvisorOptions = {}) {
    const temperature = options.temperature ?? 1.0;
    const minimumQuorum = options.minimumQuorum ?? 2;
    if (!isFinite(temperature) || temperature <= 0) {
      throw new ConfigurationError('temperature', `must be a positive number, got ${temperature}`);
    }
    if (!Number.isInteger(minimumQuorum) || minimumQuorum < 1) {
      throw new ConfigurationError('minimumQuorum', `must be a positive integer, got ${minimumQuorum}`);
    }
    this.temperature = temperature;
    this.minimumQuorum = minimumQuorum;
  }

  process(verdicts: readonly Verdict[]): AdvisorySignal {
    if (verdicts.length === 0) {
      return deepFreeze({
        dominantVerdict: null,
        softmaxProbabilities: [],
        outlierDetected: null,
        confidenceClustering: 'fragmented',
        consensusLevel: 0,
        recommendation: AdvisoryRecommendation.ESCALATE_TO_REVIEW,
        rawConfidences: [],
        verdictDistribution: {},
        effectiveEntropy: 0,
        advisoryExplanation: 'No peer verdicts received'
      });
    }

    const n = verdicts.length;
    const confidences = verdicts.map((v) => sanitizeConfidence(v.confidence));
    const probabilities = softmax(confidences, this.temperature);

    const dominantVerdict = verdicts[argmax(confidences)].verdict;

    // Vote counts and softmax mass per verdict string, in first-seen order
    const distribution: Record<string, number> = {};
    const mass = new Map<string, number>();
    verdicts.forEach((v, i) => {
      distribution[v.verdict] = (distribution[v.verdict] ?? 0) + 1;
      mass.set(v.verdict, (mass.get(v.verdict) ?? 0) + probabilities[i]);
    });

    const dominantMass = mass.get(dominantVerdict) ?? 0;
    const agreement = distribution[dominantVerdict] / n;
    const entropy = normalizedEntropy([...mass.values()], n);
    const quorumFactor = Math.min(1, n / this.minimumQuorum);

    const rawConsensus =
      (CONSENSUS_WEIGHTS.mass * dominantMass +
        CONSENSUS_WEIGHTS.agreement * agreement +
        CONSENSUS_WEIGHTS.certainty * (1 - entropy)) *
      quorumFactor;
    const consensusLevel = round(Math.max(0, Math.min(1, rawConsensus)), 4);

    const outlierIndex = detectOutlier(confidences);
    const outlierDetected = outlierIndex === null ? null : verdicts[outlierIndex].coreName;

    const spread = Math.max(...confidences) - Math.min(...confidences);
    const confidenceClustering = classifyClustering({ agreement, spread });

    const recommendation = recommend(consensusLevel, outlierDetected);

    return deepFreeze({
      dominantVerdict,
      softmaxProbabilities: verdicts.map((v, i) => ({ coreName: v.coreName, probability: probabilities[i] })),
      outlierDetected,
      confidenceClustering,
      consensusLevel,
      recommendation,
      rawConfidences: confidences,
      verdictDistribution: distribution,
      effectiveEntropy: round(entropy, 4),
      advisoryExplanation: this.generateExplanation(
        consensusLevel,
        dominantVerdict,
        distribution,
        confidenceClustering,
        entropy,
        outlierDetected
      )
    });
  }

  /**
   * Generate human-readable explanation with conciseness limits
   */
  private generateExplanation(
    consensusLevel: number,
    dominant: string,
    distribution: Record<string, number>,
    clustering: ConfidenceClustering,
    entropy: number,
    outlier: string | null
  ): string {
    const parts: string[] = [];

    if (consensusLevel >= 0.95) {
      parts.push('Near-unanimous agreement');
    } else if (consensusLevel >= 0.8) {
      parts.push('Strong weighted consensus');
    } else if (consensusLevel >= 0.6) {
      parts.push('Moderate consensus');
    } else if (consensusLevel >= 0.4) {
      parts.push('Fragmented alignment');
    } else {
      parts.push('Deep disagreement detected');
    }

    parts.push(`dominant: ${dominant} (${(consensusLevel * 100).toFixed(1)}%)`);

    const entries = Object.entries(distribution);
    if (entries.length <= 3) {
      const votes = [...entries]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([verdict, count]) => `${verdict}:${count}`);
      parts.push(`votes: ${votes.join(', ')}`);
    } else {
      const top = [...entries].sort((a, b) => b[1] - a[1]).slice(0, 2);
      parts.push(
        `votes: ${top[0][0]}:${top[0][1]}, ${top[1][0]}:${top[1][1]} (+${entries.length - 2} more)`
      );
    }

    parts.push(`confidence clustering: ${clustering}`);

    if (entropy < 0.2) {
      parts.push('low decision entropy');
    } else if (entropy > 0.7) {
      parts.push('high uncertainty (split peers)');
    }

    if (outlier) {
      parts.push(`statistical outlier: ${outlier}`);
    }

    return parts.join('; ').substring(0, MAX_EXPLANATION_LENGTH);
  }
}
