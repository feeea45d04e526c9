import { AuditEntry } from '../types/core';

/**
 * Audit Store Interface
 * Durable mirror of audit entries
 */
export interface IAuditStore {
  /**
   * Persist a single entry
   */
  persist(entry: AuditEntry): Promise<void>;

  /**
   * Load the most recent entries, oldest first
   * @param limit - Maximum number of entries to return
   */
  loadRecent(limit: number): Promise<AuditEntry[]>;
}
