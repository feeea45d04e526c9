/**
 * Advisory Metrics Tests
 */

import { getMetrics, resetMetrics, updateAdvisoryMetrics, updatePeerOutcome } from '../metrics';

describe('advisory metrics', () => {
  beforeEach(() => {
    resetMetrics();
  });

  it('counts peer outcomes by kind', async () => {
    updatePeerOutcome('verdict');
    updatePeerOutcome('verdict');
    updatePeerOutcome('timeout');

    const output = await getMetrics();
    expect(output).toContain('peer_advisory_peer_outcomes_total{outcome="verdict"} 2');
    expect(output).toContain('peer_advisory_peer_outcomes_total{outcome="timeout"} 1');
  });

  it('records advisories and consensus levels', async () => {
    updateAdvisoryMetrics({ recommendation: 'PROCEED', consensusLevel: 0.92 });

    const output = await getMetrics();
    expect(output).toContain('peer_advisory_advisories_total{recommendation="PROCEED"} 1');
    expect(output).toContain('peer_advisory_consensus_level_count 1');
    expect(output).toContain('peer_advisory_consensus_level_bucket{le="0.95"} 1');
    expect(output).toContain('peer_advisory_consensus_level_bucket{le="0.9"} 0');
  });
});
