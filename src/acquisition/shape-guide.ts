/**
 * Assertion Shape Guide
 * Reports whether a peer payload carries the minimal assertion contract.
 * Observation only: payloads are never mutated, coerced or defaulted, and the
 * caller decides whether to skip ingestion.
 */

import { IShapeGuide } from '../interfaces/IShapeGuide';
import { JsonValue, ShapeObservation } from '../types/core';
import { getPath, isJsonObject } from '../utils/json';
import { ASSERTION_PATHS, CONFIDENCE_PATHS, parseNumeric } from './extraction-rules';

export const SHAPE_REASONS = {
  NOT_OBJECT: 'non_conforming assertion: not a JSON object',
  MISSING_BOTH: 'non_conforming assertion: missing assertion and confidence',
  MISSING_ASSERTION: 'non_conforming assertion: missing assertion',
  MISSING_CONFIDENCE: 'non_conforming assertion: missing confidence',
  CONFORMING: 'conforming assertion'
} as const;

const HINT_KEYS = ['core_name', 'assertion_id', 'timestamp'] as const;

export class ShapeGuide implements IShapeGuide {
  observe(payload: unknown): ShapeObservation {
    const hints: Record<string, JsonValue> = {};

    if (!isJsonObject(payload)) {
      return { conforming: false, reason: SHAPE_REASONS.NOT_OBJECT, hints };
    }

    for (const key of HINT_KEYS) {
      if (key in payload) {
        hints[key] = payload[key];
      }
    }

    const assertionPresent = ASSERTION_PATHS.some((path) => {
      const value = getPath(payload, path);
      return typeof value === 'string' && value.trim() !== '';
    });
    const confidencePresent = CONFIDENCE_PATHS.some(
      (path) => parseNumeric(getPath(payload, path)) !== null
    );

    if (!assertionPresent && !confidencePresent) {
      return { conforming: false, reason: SHAPE_REASONS.MISSING_BOTH, hints };
    }
    if (!assertionPresent) {
      return { conforming: false, reason: SHAPE_REASONS.MISSING_ASSERTION, hints };
    }
    if (!confidencePresent) {
      return { conforming: false, reason: SHAPE_REASONS.MISSING_CONFIDENCE, hints };
    }

    return { conforming: true, reason: SHAPE_REASONS.CONFORMING, hints };
  }
}
