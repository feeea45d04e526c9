/**
 * Prometheus Metrics for the Advisory Pipeline
 * Exposes peer acquisition and advisory outcome metrics
 */

import { Registry, Counter, Histogram } from 'prom-client';

// Create a registry for advisory pipeline metrics
export const advisoryMetricsRegistry = new Registry();

// Per-endpoint acquisition outcomes (verdict, timeout, unreachable, ...)
export const peerOutcomesTotal = new Counter({
  name: 'peer_advisory_peer_outcomes_total',
  help: 'Total peer acquisition outcomes by kind',
  labelNames: ['outcome'],
  registers: [advisoryMetricsRegistry]
});

// Advisories computed by recommendation
export const advisoriesTotal = new Counter({
  name: 'peer_advisory_advisories_total',
  help: 'Total advisories computed by recommendation',
  labelNames: ['recommendation'],
  registers: [advisoryMetricsRegistry]
});

// Consensus level distribution
export const consensusLevelHistogram = new Histogram({
  name: 'peer_advisory_consensus_level',
  help: 'Consensus level of computed advisories',
  buckets: [0.2, 0.4, 0.6, 0.75, 0.8, 0.9, 0.95, 1.0],
  registers: [advisoryMetricsRegistry]
});

// Acquisition duration
export const acquisitionDuration = new Histogram({
  name: 'peer_advisory_acquisition_duration_seconds',
  help: 'Duration of a full verdict acquisition cycle in seconds',
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [advisoryMetricsRegistry]
});

/**
 * Update peer outcome metric
 */
export function updatePeerOutcome(outcome: string): void {
  peerOutcomesTotal.inc({ outcome });
}

/**
 * Update advisory metrics from a computed signal
 */
export function updateAdvisoryMetrics(data: {
  recommendation: string;
  consensusLevel: number;
}): void {
  advisoriesTotal.inc({ recommendation: data.recommendation });
  consensusLevelHistogram.observe(data.consensusLevel);
}

/**
 * Get metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return advisoryMetricsRegistry.metrics();
}

/**
 * Reset all metrics (for testing)
 */
export function resetMetrics(): void {
  advisoryMetricsRegistry.resetMetrics();
}
