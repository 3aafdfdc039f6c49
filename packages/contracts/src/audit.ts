/**
 * Audit Contract
 *
 * Every state-changing workflow operation, successful or not, produces
 * exactly one AuditEntry. Entries are immutable and append-only.
 */

import type { Role } from "./permission.js";

export type AuditOperation = "apply_template" | "execute_transition" | "remove_template";

/** A single change an operation made (or would have made) */
export type ChangeDescriptor =
  | { type: "role_added"; role: Role; users: string[] }
  | { type: "role_removed"; role: Role; users: string[] }
  | { type: "state_set"; to: string }
  | { type: "state_changed"; from: string; to: string; transitionId: string }
  | { type: "backup_captured" }
  | { type: "instance_removed"; templateId: string; state: string }
  | { type: "backup_restored"; templateId: string | null; state: string | null };

export interface AuditEntry {
  id: string;
  timestamp: string;
  operation: AuditOperation;
  userId: string;
  contentUid: string;
  /** Null when the operation failed before a template could be resolved */
  templateId: string | null;
  success: boolean;
  changes: ChangeDescriptor[];
  error?: string;
  /** The engine error category of a failed operation */
  errorType?: string;
}

/**
 * Destination for audit entries. Append-only.
 * Failures are reported by rejecting; the engine logs them and never
 * rolls back the operation being audited.
 */
export interface AuditSink {
  append(entry: AuditEntry): Promise<void>;
}

export interface AuditQuery {
  userId?: string;
  contentUid?: string;
  templateId?: string;
  operation?: AuditOperation;
  success?: boolean;
  /** ISO timestamp, inclusive */
  dateFrom?: string;
  /** ISO timestamp, inclusive */
  dateTo?: string;
  limit?: number;
  offset?: number;
}

export interface AuditQueryResult {
  data: AuditEntry[];
  total: number;
}

export interface AuditSummary {
  totalOperations: number;
  successfulOperations: number;
  failedOperations: number;
  successRate: number;
  operationsByType: Partial<Record<AuditOperation, number>>;
  uniqueUsers: number;
  uniqueTemplates: number;
}

/** A sink that can also be read back (in-memory, database) */
export interface QueryableAuditSink extends AuditSink {
  query(query: AuditQuery): Promise<AuditQueryResult>;
  summary(query?: Pick<AuditQuery, "dateFrom" | "dateTo">): Promise<AuditSummary>;
}
