import { ShapeObservation } from '../types/core';

/**
 * Shape Guide Interface
 * Classifies raw peer payloads against the minimal assertion contract
 */
export interface IShapeGuide {
  /**
   * Inspect a payload without altering it
   * @param payload - Arbitrary value decoded from a peer response
   * @returns Conformance flag, the specific reason, and pass-through identifying hints
   */
  observe(payload: unknown): ShapeObservation;
}
