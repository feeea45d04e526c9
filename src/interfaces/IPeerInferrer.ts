/**
 * Peer Inferrer Interface
 * Strategy for resolving the peer a decision context refers to
 */
export interface IPeerInferrer {
  /**
   * @returns The inferred peer's core name, or null when nothing matches
   */
  infer(decisionContext: string): string | null;
}
