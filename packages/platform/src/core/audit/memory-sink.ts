/**
 * In-Memory Audit Sink
 *
 * Append-only list of audit entries with the same query and summary
 * surface as the database sink. Used in development, when no
 * DATABASE_URL is configured, and in tests.
 */

import type {
  AuditEntry,
  AuditQuery,
  AuditQueryResult,
  AuditSummary,
  QueryableAuditSink,
} from "@curriflow/contracts";

export const DEFAULT_AUDIT_PAGE_SIZE = 50;

// Timestamps may differ in fractional-second precision, so compare instants.
const instant = (iso: string): number => Date.parse(iso);

function matches(entry: AuditEntry, query: AuditQuery): boolean {
  if (query.userId && entry.userId !== query.userId) return false;
  if (query.contentUid && entry.contentUid !== query.contentUid) return false;
  if (query.templateId && entry.templateId !== query.templateId) return false;
  if (query.operation && entry.operation !== query.operation) return false;
  if (query.success !== undefined && entry.success !== query.success) return false;
  if (query.dateFrom && instant(entry.timestamp) < instant(query.dateFrom)) return false;
  if (query.dateTo && instant(entry.timestamp) > instant(query.dateTo)) return false;
  return true;
}

/** Totals, success rate, and distinct counts over a set of entries */
export function summarizeEntries(entries: readonly AuditEntry[]): AuditSummary {
  const operationsByType: AuditSummary["operationsByType"] = {};
  const users = new Set<string>();
  const templates = new Set<string>();
  let successful = 0;

  for (const entry of entries) {
    operationsByType[entry.operation] = (operationsByType[entry.operation] ?? 0) + 1;
    users.add(entry.userId);
    if (entry.templateId) templates.add(entry.templateId);
    if (entry.success) successful++;
  }

  return {
    totalOperations: entries.length,
    successfulOperations: successful,
    failedOperations: entries.length - successful,
    successRate: entries.length > 0 ? successful / entries.length : 0,
    operationsByType,
    uniqueUsers: users.size,
    uniqueTemplates: templates.size,
  };
}

export class InMemoryAuditSink implements QueryableAuditSink {
  private readonly entries: AuditEntry[] = [];

  async append(entry: AuditEntry): Promise<void> {
    // Redelivered entries (retry after a timeout) are kept once.
    if (this.entries.some((e) => e.id === entry.id)) return;
    this.entries.push(Object.freeze({ ...entry }));
  }

  /** Newest first, then paginated */
  async query(query: AuditQuery = {}): Promise<AuditQueryResult> {
    const limit = query.limit ?? DEFAULT_AUDIT_PAGE_SIZE;
    const offset = query.offset ?? 0;

    const filtered = this.entries
      .map((entry, index) => ({ entry, index }))
      .filter(({ entry }) => matches(entry, query))
      .sort((a, b) => instant(b.entry.timestamp) - instant(a.entry.timestamp) || b.index - a.index)
      .map(({ entry }) => entry);

    return {
      data: filtered.slice(offset, offset + limit),
      total: filtered.length,
    };
  }

  async summary(query: Pick<AuditQuery, "dateFrom" | "dateTo"> = {}): Promise<AuditSummary> {
    return summarizeEntries(this.entries.filter((entry) => matches(entry, query)));
  }

  /** All entries in append order (for tests and inspection) */
  all(): readonly AuditEntry[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }
}
