/**
 * Peer Consensus Advisory - Main Entry Point
 */

// Export core types
export * from './types/core';

// Export interfaces
export * from './interfaces/IShapeGuide';
export * from './interfaces/IVerdictAcquirer';
export * from './interfaces/IConsensusAdvisor';
export * from './interfaces/IAuditMatrix';
export * from './interfaces/IAuditStore';
export * from './interfaces/IStateHub';
export * from './interfaces/IPeerInferrer';
export * from './interfaces/IIntegrationCoordinator';

// Export configuration
export { AdvisoryConfigManager, DEFAULT_ADVISORY_CONFIG } from './config/advisory-config';
export type { AdvisoryConfig } from './config/advisory-config';

// Export acquisition
export { ShapeGuide, SHAPE_REASONS } from './acquisition/shape-guide';
export { EXTRACTION_RULES, extractVerdict, createVerdict } from './acquisition/extraction-rules';
export type { ExtractionRule, RuleExtraction } from './acquisition/extraction-rules';
export { EndpointDiscovery, parseEndpointList } from './acquisition/endpoint-discovery';
export { VerdictAcquirer } from './acquisition/verdict-acquirer';
export type { EndpointSourceProvider, VerdictAcquirerOptions } from './acquisition/verdict-acquirer';

// Export consensus
export { ConsensusAdvisor, recommend, classifyClustering } from './consensus/advisor';
export type { ConsensusAdvisorOptions } from './consensus/advisor';
export { detectOutlier, computeFences } from './consensus/outlier-detector';

// Export audit
export { AuditMatrix, verifyAuditChain, computeEntryHash, consensusBucket } from './audit/matrix';
export { PostgresAuditStore } from './audit/postgres-store';

// Export state hub
export { StateHub } from './state/hub';

// Export coordination
export { IntegrationCoordinator } from './coordination/coordinator';
export { KeywordPeerInferrer, DEFAULT_PEER_KEYWORDS } from './coordination/peer-inferrer';
export type { PeerKeywordRule } from './coordination/peer-inferrer';
export { createAdvisoryPipeline } from './pipeline';
export type { AdvisoryPipeline, AdvisoryPipelineOptions } from './pipeline';

// Export errors, logging and metrics
export { ConfigurationError, PeerRequestError } from './utils/errors';
export { logger, LogLevel } from './utils/logger';
export { advisoryMetricsRegistry, getMetrics } from './monitoring/metrics';
