/**
 * Keyword Peer Inferrer
 * Resolves the peer a decision context refers to by case-insensitive substring
 * match against an ordered keyword table; the first matching row wins.
 */

import { IPeerInferrer } from '../interfaces/IPeerInferrer';

export interface PeerKeywordRule {
  keywords: readonly string[];
  coreName: string;
}

export const DEFAULT_PEER_KEYWORDS: readonly PeerKeywordRule[] = [
  { keywords: ['kaygee', 'empirical'], coreName: 'KayGee_1.0' },
  { keywords: ['ecm', 'convergent'], coreName: 'UCM_Core_ECM' },
  { keywords: ['genesis'], coreName: 'Caleon_Genesis_1.12' },
  { keywords: ['cali_x'], coreName: 'Cali_X_One' }
];

export class KeywordPeerInferrer implements IPeerInferrer {
  private readonly rules: readonly PeerKeywordRule[];

  constructor(rules: readonly PeerKeywordRule[] = DEFAULT_PEER_KEYWORDS) {
    this.rules = rules.map((rule) => ({
      keywords: rule.keywords.map((keyword) => keyword.toLowerCase()),
      coreName: rule.coreName
    }));
  }

  infer(decisionContext: string): string | null {
    const text = decisionContext.toLowerCase();
    const rule = this.rules.find((candidate) =>
      candidate.keywords.some((keyword) => keyword !== '' && text.includes(keyword))
    );
    return rule ? rule.coreName : null;
  }
}
