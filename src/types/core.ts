/**
 * Core data models for the peer consensus advisory pipeline
 */

// ============================================================================
// Verdict Models
// ============================================================================

/**
 * JSON-compatible value as received from a peer
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * A single peer's normalized assertion for a decision context
 */
export interface Verdict {
  readonly coreName: string;
  readonly verdict: string;
  readonly confidence: number; // 0-1, clamped on extraction
  readonly metadata: Readonly<Record<string, JsonValue>>;
}

// ============================================================================
// Advisory Models
// ============================================================================

export type ConfidenceClustering =
  | 'unanimous'
  | 'strong'
  | 'moderate'
  | 'fragmented'
  | 'conflicted';

export enum AdvisoryRecommendation {
  PROCEED = 'PROCEED',
  PROCEED_CAUTIOUSLY = 'PROCEED_CAUTIOUSLY',
  PAUSE_AND_VERIFY = 'PAUSE_AND_VERIFY',
  ESCALATE_TO_REVIEW = 'ESCALATE_TO_REVIEW',
  OUTLIER_INVESTIGATION = 'OUTLIER_INVESTIGATION'
}

export interface CoreProbability {
  readonly coreName: string;
  readonly probability: number;
}

/**
 * Aggregated, non-authoritative signal computed from a set of verdicts
 */
export interface AdvisorySignal {
  readonly dominantVerdict: string | null;
  readonly softmaxProbabilities: readonly CoreProbability[];
  readonly outlierDetected: string | null;
  readonly confidenceClustering: ConfidenceClustering;
  readonly consensusLevel: number; // 0-1
  readonly recommendation: AdvisoryRecommendation;

  readonly rawConfidences: readonly number[];
  readonly verdictDistribution: Readonly<Record<string, number>>;
  readonly effectiveEntropy: number; // 0 (single verdict) to 1 (even split)
  readonly advisoryExplanation: string;
}

// ============================================================================
// Audit Models
// ============================================================================

export type DerivationMetadata = Record<string, JsonValue>;

export interface AuditEntry {
  readonly entryId: string;
  readonly sequenceNumber: number;
  readonly timestamp: string; // ISO-8601
  readonly decisionContext: string;
  readonly advisory: AdvisorySignal;
  readonly verdictSources: readonly string[];
  readonly derivationMetadata: Readonly<DerivationMetadata>;
  readonly previousHash: string;
  readonly entryHash: string;
}

export type ConsensusBucket =
  | 'unanimous'
  | 'strong'
  | 'moderate'
  | 'fragmented'
  | 'conflicted';

export interface AuditSummary {
  consensusDistribution: Record<ConsensusBucket, number>;
  recommendationCounts: Record<AdvisoryRecommendation, number>;
  totalRecorded: number;
  retained: number;
  lastSequence: number;
}

export interface ChainVerification {
  ok: boolean;
  firstBadSequence: number | null;
}

// ============================================================================
// State Hub Models
// ============================================================================

export enum PeerAvailability {
  AVAILABLE = 'AVAILABLE',
  SILENT = 'SILENT',
  UNAVAILABLE = 'UNAVAILABLE'
}

export interface PeerState {
  coreName: string;
  availability: PeerAvailability;
  lastAssertion: JsonObject | null;
  lastSeen: number; // epoch milliseconds
}

export interface HubEvent {
  type: string;
  timestamp: number; // epoch milliseconds
  [key: string]: JsonValue;
}

export interface ControlLogEntry {
  actionPayload: JsonObject;
  timestamp: number; // epoch milliseconds
}

export interface HubSnapshot {
  timestamp: number | null;
  peers: Record<string, PeerState>;
  events: HubEvent[];
  divergence: boolean;
}

// ============================================================================
// Acquisition Models
// ============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH';

export interface EndpointDescriptor {
  coreName: string;
  url: string;
  method: HttpMethod;
  payloadKey: string;
}

export type EndpointSource = 'inline' | 'file' | 'conventional' | 'default';

export interface DiscoveredEndpoints {
  source: EndpointSource;
  endpoints: EndpointDescriptor[];
}

export type AcquisitionOutcomeKind =
  | 'verdict'
  | 'non_conforming'
  | 'no_usable_payload'
  | 'http_error'
  | 'unreachable'
  | 'timeout';

export interface AcquisitionOutcome {
  coreName: string;
  url: string;
  kind: AcquisitionOutcomeKind;
  detail: string;
  latencyMs: number;
  verdict?: Verdict;
}

export interface AcquisitionResult {
  verdicts: Verdict[];
  outcomes: AcquisitionOutcome[];
}

export interface ShapeObservation {
  conforming: boolean;
  reason: string;
  hints: Record<string, JsonValue>;
}

// ============================================================================
// Coordination Models
// ============================================================================

export type ActionLabel =
  | 'execute_immediately'
  | 'execute_with_monitoring'
  | 'defer_and_validate'
  | 'escalate_for_manual_review'
  | 'investigate_outlier';

export type AssertionLevel = 'command' | 'suggestion';

export interface ActionRecommendation {
  recommendation: AdvisoryRecommendation;
  advisoryConfidence: number;
  context: string;
  action: ActionLabel;
  justification: string;
  targetPeer: string | null;
}

export interface AdvisoryStatistics {
  audit: AuditSummary;
  peerCounts: Record<PeerAvailability, number>;
  controlLogSize: number;
}
