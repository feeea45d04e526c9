/**
 * Advisory pipeline wiring
 * Builds every component from one configuration; all collaborators are
 * passed explicitly, so several independent pipelines can coexist.
 */

import { Pool } from 'pg';
import { AdvisoryConfig, AdvisoryConfigManager } from './config/advisory-config';
import { EndpointDiscovery } from './acquisition/endpoint-discovery';
import { ShapeGuide } from './acquisition/shape-guide';
import { VerdictAcquirer } from './acquisition/verdict-acquirer';
import { ConsensusAdvisor } from './consensus/advisor';
import { AuditMatrix } from './audit/matrix';
import { PostgresAuditStore } from './audit/postgres-store';
import { StateHub } from './state/hub';
import { IntegrationCoordinator } from './coordination/coordinator';
import { IPeerInferrer } from './interfaces/IPeerInferrer';

export interface AdvisoryPipelineOptions {
  config?: AdvisoryConfig;
  env?: NodeJS.ProcessEnv;
  pool?: Pool;
  peerInferrer?: IPeerInferrer;
}

export interface AdvisoryPipeline {
  config: AdvisoryConfig;
  acquirer: VerdictAcquirer;
  advisor: ConsensusAdvisor;
  auditMatrix: AuditMatrix;
  hub: StateHub;
  coordinator: IntegrationCoordinator;
}

export function createAdvisoryPipeline(options: AdvisoryPipelineOptions = {}): AdvisoryPipeline {
  const env = options.env ?? process.env;
  const config = options.config
    ? new AdvisoryConfigManager(options.config).getConfig()
    : AdvisoryConfigManager.fromEnvironment(env).getConfig();

  const acquirer = new VerdictAcquirer({
    discovery: new EndpointDiscovery({ baseDir: config.baseDir, env }),
    shapeGuide: new ShapeGuide(),
    defaultTimeoutMs: config.verdictTimeoutMs
  });
  const advisor = new ConsensusAdvisor({
    temperature: config.softmaxTemperature,
    minimumQuorum: config.minimumQuorum
  });
  const auditMatrix = new AuditMatrix({ capacity: config.auditRetention });
  const hub = new StateHub({
    eventLogCap: config.eventLogCap,
    controlLogCap: config.controlLogCap
  });

  const coordinator = new IntegrationCoordinator({
    acquirer,
    advisor,
    auditMatrix,
    hub,
    config,
    peerInferrer: options.peerInferrer,
    auditStore: options.pool ? new PostgresAuditStore(options.pool) : undefined
  });

  return { config, acquirer, advisor, auditMatrix, hub, coordinator };
}
