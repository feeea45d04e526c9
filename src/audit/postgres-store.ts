/**
 * PostgreSQL Audit Store
 * Mirrors audit entries into the audit_entries table (see sql/audit_entries.sql)
 */

import { Pool } from 'pg';
import { IAuditStore } from '../interfaces/IAuditStore';
import { AdvisoryRecommendation, AuditEntry } from '../types/core';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { isJsonObject } from '../utils/json';

type AuditEntryRow = {
  entry: unknown;
};

const RECOMMENDATIONS: readonly string[] = Object.values(AdvisoryRecommendation);

/**
 * Structural check of an entry decoded from JSONB
 */
export function isAuditEntry(value: unknown): value is AuditEntry {
  if (!isJsonObject(value)) {
    return false;
  }
  const advisory = value.advisory;
  if (!isJsonObject(advisory)) {
    return false;
  }
  return (
    typeof value.entryId === 'string' &&
    typeof value.sequenceNumber === 'number' &&
    typeof value.timestamp === 'string' &&
    typeof value.decisionContext === 'string' &&
    Array.isArray(value.verdictSources) &&
    isJsonObject(value.derivationMetadata) &&
    typeof value.previousHash === 'string' &&
    typeof value.entryHash === 'string' &&
    typeof advisory.consensusLevel === 'number' &&
    typeof advisory.recommendation === 'string' &&
    RECOMMENDATIONS.includes(advisory.recommendation)
  );
}

export class PostgresAuditStore implements IAuditStore {
  private db: Pool;

  constructor(db: Pool) {
    this.db = db;
  }

  /**
   * Persist a single entry
   */
  async persist(entry: AuditEntry): Promise<void> {
    try {
      const query = `
        INSERT INTO audit_entries (
          entry_id, sequence_number, recorded_at, decision_context,
          recommendation, consensus_level, previous_hash, entry_hash, entry
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
        ON CONFLICT (entry_id) DO NOTHING
      `;

      const values = [
        entry.entryId,
        entry.sequenceNumber,
        entry.timestamp,
        entry.decisionContext,
        entry.advisory.recommendation,
        entry.advisory.consensusLevel,
        entry.previousHash,
        entry.entryHash,
        JSON.stringify(entry)
      ];

      await this.db.query(query, values);
    } catch (error) {
      logger.error('Error persisting audit entry', { component: 'AuditStore' }, errorMessage(error));
      throw error;
    }
  }

  /**
   * Load the highest-sequence entries in sequence order; rows that fail validation are skipped
   */
  async loadRecent(limit: number): Promise<AuditEntry[]> {
    try {
      const query = `
        SELECT entry
        FROM audit_entries
        ORDER BY sequence_number DESC
        LIMIT $1
      `;

      const result = await this.db.query<AuditEntryRow>(query, [limit]);

      const entries: AuditEntry[] = [];
      for (const row of result.rows) {
        if (isAuditEntry(row.entry)) {
          entries.push(row.entry);
        } else {
          logger.warn('Skipping malformed audit row', { component: 'AuditStore' });
        }
      }
      return entries.reverse();
    } catch (error) {
      logger.error('Error loading audit entries', { component: 'AuditStore' }, errorMessage(error));
      throw error;
    }
  }
}
