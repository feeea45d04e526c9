/**
 * Advisory Configuration
 * Tunables for acquisition, consensus computation and retention
 */

import { ConfigurationError } from '../utils/errors';

export interface AdvisoryConfig {
  verdictTimeoutMs: number;
  softmaxTemperature: number;
  minimumQuorum: number;
  auditRetention: number;
  eventLogCap: number;
  controlLogCap: number;
  baseDir: string;
  enableAuditPersistence: boolean;
  enableControlAttribution: boolean;
}

/**
 * Default configuration
 */
export const DEFAULT_ADVISORY_CONFIG: AdvisoryConfig = {
  verdictTimeoutMs: 5000,
  softmaxTemperature: 1.0,
  minimumQuorum: 2,
  auditRetention: 1000,
  eventLogCap: 500,
  controlLogCap: 1000,
  baseDir: process.cwd(),
  enableAuditPersistence: false,
  enableControlAttribution: true
};

/**
 * Advisory Configuration Manager
 */
export class AdvisoryConfigManager {
  private config: AdvisoryConfig;

  constructor(overrides?: Partial<AdvisoryConfig>) {
    const config = {
      ...DEFAULT_ADVISORY_CONFIG,
      ...overrides
    };
    AdvisoryConfigManager.validate(config);
    this.config = config;
  }

  /**
   * Get a copy of the full configuration
   */
  getConfig(): AdvisoryConfig {
    return { ...this.config };
  }

  get<K extends keyof AdvisoryConfig>(key: K): AdvisoryConfig[K] {
    return this.config[key];
  }

  /**
   * Update configuration; rejected updates leave the current values untouched
   */
  updateConfig(updates: Partial<AdvisoryConfig>): void {
    const next = {
      ...this.config,
      ...updates
    };
    AdvisoryConfigManager.validate(next);
    this.config = next;
  }

  static validate(config: AdvisoryConfig): void {
    requirePositive('verdictTimeoutMs', config.verdictTimeoutMs);
    requirePositive('softmaxTemperature', config.softmaxTemperature);
    requirePositiveInteger('minimumQuorum', config.minimumQuorum);
    requirePositiveInteger('auditRetention', config.auditRetention);
    requirePositiveInteger('eventLogCap', config.eventLogCap);
    requirePositiveInteger('controlLogCap', config.controlLogCap);
    if (config.baseDir.trim() === '') {
      throw new ConfigurationError('baseDir', 'must not be empty');
    }
  }

  /**
   * Load from environment variables
   */
  static fromEnvironment(env: NodeJS.ProcessEnv = process.env): AdvisoryConfigManager {
    const config: Partial<AdvisoryConfig> = {};

    if (env.VERDICT_TIMEOUT_MS !== undefined) {
      config.verdictTimeoutMs = parseNumber('VERDICT_TIMEOUT_MS', env.VERDICT_TIMEOUT_MS);
    }

    if (env.SOFTMAX_TEMPERATURE !== undefined) {
      config.softmaxTemperature = parseNumber('SOFTMAX_TEMPERATURE', env.SOFTMAX_TEMPERATURE);
    }

    if (env.MINIMUM_QUORUM !== undefined) {
      config.minimumQuorum = parseNumber('MINIMUM_QUORUM', env.MINIMUM_QUORUM);
    }

    if (env.AUDIT_RETENTION !== undefined) {
      config.auditRetention = parseNumber('AUDIT_RETENTION', env.AUDIT_RETENTION);
    }

    if (env.EVENT_LOG_CAP !== undefined) {
      config.eventLogCap = parseNumber('EVENT_LOG_CAP', env.EVENT_LOG_CAP);
    }

    if (env.CONTROL_LOG_CAP !== undefined) {
      config.controlLogCap = parseNumber('CONTROL_LOG_CAP', env.CONTROL_LOG_CAP);
    }

    if (env.ADVISORY_BASE_DIR !== undefined) {
      config.baseDir = env.ADVISORY_BASE_DIR;
    }

    if (env.ENABLE_AUDIT_PERSISTENCE !== undefined) {
      config.enableAuditPersistence = env.ENABLE_AUDIT_PERSISTENCE === 'true';
    }

    if (env.ENABLE_CONTROL_ATTRIBUTION !== undefined) {
      config.enableControlAttribution = env.ENABLE_CONTROL_ATTRIBUTION === 'true';
    }

    return new AdvisoryConfigManager(config);
  }
}

function parseNumber(name: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || isNaN(value)) {
    throw new ConfigurationError(name, `expected a number, got "${raw}"`);
  }
  return value;
}

function requirePositive(name: string, value: number): void {
  if (typeof value !== 'number' || !isFinite(value) || value <= 0) {
    throw new ConfigurationError(name, `must be a positive number, got ${value}`);
  }
}

function requirePositiveInteger(name: string, value: number): void {
  requirePositive(name, value);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(name, `must be an integer, got ${value}`);
  }
}
