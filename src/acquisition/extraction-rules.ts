/**
 * Verdict Extraction Rules
 * Peers report their assertion under several alternate keys. The locations are
 * kept in ordered tables, evaluated top-to-bottom, so precedence can be read
 * and tested in one place.
 */

import { JsonObject, JsonValue, Verdict } from '../types/core';
import { deepFreeze, getPath, isJsonObject } from '../utils/json';

export type KeyPath = readonly string[];

/**
 * Locations where an assertion string may appear, in priority order
 */
export const ASSERTION_PATHS: readonly KeyPath[] = [
  ['assertion'],
  ['verdict'],
  ['status'],
  ['response'],
  ['final_verdict', 'status'],
  ['final_verdict', 'verdict'],
  ['final_verdict', 'decision']
];

/**
 * Locations where a confidence number may appear, in priority order
 */
export const CONFIDENCE_PATHS: readonly KeyPath[] = [
  ['confidence'],
  ['final_verdict', 'inevitability'],
  ['final_verdict', 'confidence'],
  ['final_verdict', 'probability'],
  ['final_verdict', 'meta', 'confidence']
];

const FINAL_VERDICT_ASSERTION_PATHS: readonly KeyPath[] = ASSERTION_PATHS.filter(
  (path) => path[0] === 'final_verdict'
);
const FINAL_VERDICT_CONFIDENCE_PATHS: readonly KeyPath[] = CONFIDENCE_PATHS.filter(
  (path) => path[0] === 'final_verdict'
);

export interface ExtractedAssertion {
  assertion: string;
  confidence: number;
}

export interface ExtractionRule {
  name: string;
  /** Top-level keys consumed by the rule; everything else passes through to metadata */
  consumedKeys: readonly string[];
  matches(payload: JsonObject): boolean;
  extract(payload: JsonObject): ExtractedAssertion | null;
}

/**
 * Non-blank text; numbers and booleans are rendered as text
 */
export function coerceString(value: JsonValue | undefined): string | null {
  if (typeof value === 'string') {
    const text = value.trim();
    return text === '' ? null : text;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return null;
}

/**
 * Finite number from a number or numeric string, without clamping
 */
export function parseNumeric(value: JsonValue | undefined): number | null {
  if (typeof value === 'number') {
    return isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function clampConfidence(value: number): number {
  return Math.max(0, Math.min(1, value));
}

export function coerceConfidence(value: JsonValue | undefined): number | null {
  const parsed = parseNumeric(value);
  return parsed === null ? null : clampConfidence(parsed);
}

function firstString(payload: JsonObject, paths: readonly KeyPath[]): string | null {
  for (const path of paths) {
    const text = coerceString(getPath(payload, path));
    if (text !== null) {return text;}
  }
  return null;
}

function firstConfidence(payload: JsonObject, paths: readonly KeyPath[]): number | null {
  for (const path of paths) {
    const confidence = coerceConfidence(getPath(payload, path));
    if (confidence !== null) {return confidence;}
  }
  return null;
}

function flatRule(assertionKey: string, requireConfidenceKey: boolean): ExtractionRule {
  return {
    name: assertionKey,
    consumedKeys: [assertionKey, 'confidence'],
    matches: (payload) =>
      assertionKey in payload && (!requireConfidenceKey || 'confidence' in payload),
    extract: (payload) => {
      const assertion = coerceString(payload[assertionKey]);
      const confidence = coerceConfidence(payload.confidence);
      if (assertion === null || confidence === null) {return null;}
      return { assertion, confidence };
    }
  };
}

/**
 * Ordered extraction table; the first matching rule decides the outcome
 */
export const EXTRACTION_RULES: readonly ExtractionRule[] = [
  flatRule('assertion', false),
  {
    name: 'final_verdict',
    consumedKeys: [],
    matches: (payload) => isJsonObject(payload.final_verdict),
    extract: (payload) => {
      const assertion = firstString(payload, FINAL_VERDICT_ASSERTION_PATHS);
      const confidence = firstConfidence(payload, FINAL_VERDICT_CONFIDENCE_PATHS);
      if (assertion === null || confidence === null) {return null;}
      return { assertion, confidence };
    }
  },
  flatRule('verdict', true),
  flatRule('status', true),
  flatRule('response', true)
];

/**
 * Build an immutable verdict; confidence is clamped to [0, 1]
 */
export function createVerdict(
  coreName: string,
  verdict: string,
  confidence: number,
  metadata: Record<string, JsonValue> = {}
): Verdict {
  return deepFreeze({
    coreName,
    verdict,
    confidence: clampConfidence(confidence),
    metadata: structuredClone(metadata)
  });
}

export interface RuleExtraction {
  rule: string;
  verdict: Verdict;
}

/**
 * Apply the extraction table to a payload. Returns null when no rule matches
 * or the matching rule cannot locate both fields; nothing is defaulted.
 */
export function extractVerdict(fallbackCoreName: string, payload: JsonObject): RuleExtraction | null {
  const rule = EXTRACTION_RULES.find((candidate) => candidate.matches(payload));
  if (!rule) {return null;}

  const extracted = rule.extract(payload);
  if (!extracted) {return null;}

  const coreName = coerceString(payload.core_name) ?? fallbackCoreName;
  const consumed = new Set<string>([...rule.consumedKeys, 'core_name']);
  const metadata: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (!consumed.has(key)) {
      metadata[key] = value;
    }
  }

  return {
    rule: rule.name,
    verdict: createVerdict(coreName, extracted.assertion, extracted.confidence, metadata)
  };
}
