/**
 * Postgres Audit Sink
 *
 * Persists workflow audit entries to the workflow_audit_log table and
 * reads them back with filtering and pagination.
 *
 * Inserts are idempotent on the entry id, so the recorder can redeliver
 * an entry whose first write timed out without duplicating it.
 */

import type {
  AuditEntry,
  AuditOperation,
  AuditQuery,
  AuditQueryResult,
  AuditSummary,
  ChangeDescriptor,
  QueryableAuditSink,
} from "@curriflow/contracts";
import { getDatabase } from "../database/connection.js";
import { DEFAULT_AUDIT_PAGE_SIZE } from "./memory-sink.js";

const TABLE = "workflow_audit_log";

interface AuditRow {
  id: string;
  created_at: Date | string;
  operation: AuditOperation;
  user_id: string;
  content_uid: string;
  template_id: string | null;
  success: boolean;
  changes: ChangeDescriptor[] | null;
  error: string | null;
  error_type: string | null;
}

type SqlParam = string | number | boolean | null;

/**
 * Creates the audit table and its indexes if they don't exist.
 * Called once at startup when a database is configured.
 */
export async function ensureAuditTable(): Promise<void> {
  const { sql: pgSql } = getDatabase();

  await pgSql.unsafe(`
    CREATE TABLE IF NOT EXISTS ${TABLE} (
      id UUID PRIMARY KEY,
      created_at TIMESTAMPTZ NOT NULL,
      operation TEXT NOT NULL,
      user_id TEXT NOT NULL,
      content_uid TEXT NOT NULL,
      template_id TEXT,
      success BOOLEAN NOT NULL,
      changes JSONB NOT NULL DEFAULT '[]'::jsonb,
      error TEXT,
      error_type TEXT
    )
  `);
  await pgSql.unsafe(
    `CREATE INDEX IF NOT EXISTS idx_${TABLE}_content ON ${TABLE} (content_uid, created_at DESC)`
  );
  await pgSql.unsafe(
    `CREATE INDEX IF NOT EXISTS idx_${TABLE}_user ON ${TABLE} (user_id, created_at DESC)`
  );
}

function buildWhere(query: AuditQuery): { where: string; params: SqlParam[] } {
  const conditions: string[] = [];
  const params: SqlParam[] = [];

  const add = (clause: (index: number) => string, value: SqlParam) => {
    params.push(value);
    conditions.push(clause(params.length));
  };

  if (query.userId) add((i) => `user_id = $${i}`, query.userId);
  if (query.contentUid) add((i) => `content_uid = $${i}`, query.contentUid);
  if (query.templateId) add((i) => `template_id = $${i}`, query.templateId);
  if (query.operation) add((i) => `operation = $${i}`, query.operation);
  if (query.success !== undefined) add((i) => `success = $${i}`, query.success);
  if (query.dateFrom) add((i) => `created_at >= $${i}`, query.dateFrom);
  if (query.dateTo) add((i) => `created_at <= $${i}`, query.dateTo);

  return {
    where: conditions.length > 0 ? conditions.join(" AND ") : "TRUE",
    params,
  };
}

function toEntry(row: AuditRow): AuditEntry {
  return {
    id: row.id,
    timestamp: row.created_at instanceof Date ? row.created_at.toISOString() : String(row.created_at),
    operation: row.operation,
    userId: row.user_id,
    contentUid: row.content_uid,
    templateId: row.template_id,
    success: row.success,
    changes: row.changes ?? [],
    ...(row.error ? { error: row.error } : {}),
    ...(row.error_type ? { errorType: row.error_type } : {}),
  };
}

export class PostgresAuditSink implements QueryableAuditSink {
  async append(entry: AuditEntry): Promise<void> {
    const { sql: pgSql } = getDatabase();

    await pgSql.unsafe(
      `INSERT INTO ${TABLE} (id, created_at, operation, user_id, content_uid, template_id, success, changes, error, error_type)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9, $10)
       ON CONFLICT (id) DO NOTHING`,
      [
        entry.id,
        entry.timestamp,
        entry.operation,
        entry.userId,
        entry.contentUid,
        entry.templateId,
        entry.success,
        JSON.stringify(entry.changes),
        entry.error ?? null,
        entry.errorType ?? null,
      ]
    );
  }

  async query(query: AuditQuery = {}): Promise<AuditQueryResult> {
    const { sql: pgSql } = getDatabase();
    const { where, params } = buildWhere(query);
    const limit = query.limit ?? DEFAULT_AUDIT_PAGE_SIZE;
    const offset = query.offset ?? 0;

    const countRows = await pgSql.unsafe<{ count: number }[]>(
      `SELECT COUNT(*)::int AS count FROM ${TABLE} WHERE ${where}`,
      params
    );

    const dataRows = await pgSql.unsafe<AuditRow[]>(
      `SELECT id, created_at, operation, user_id, content_uid, template_id, success, changes, error, error_type
       FROM ${TABLE} WHERE ${where}
       ORDER BY created_at DESC
       LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
      [...params, limit, offset]
    );

    return {
      data: dataRows.map(toEntry),
      total: countRows[0]?.count ?? 0,
    };
  }

  async summary(query: Pick<AuditQuery, "dateFrom" | "dateTo"> = {}): Promise<AuditSummary> {
    const { sql: pgSql } = getDatabase();
    const { where, params } = buildWhere(query);

    const totals = await pgSql.unsafe<
      { total: number; successful: number; users: number; templates: number }[]
    >(
      `SELECT COUNT(*)::int AS total,
              COUNT(*) FILTER (WHERE success)::int AS successful,
              COUNT(DISTINCT user_id)::int AS users,
              COUNT(DISTINCT template_id)::int AS templates
       FROM ${TABLE} WHERE ${where}`,
      params
    );

    const byType = await pgSql.unsafe<{ operation: AuditOperation; count: number }[]>(
      `SELECT operation, COUNT(*)::int AS count FROM ${TABLE} WHERE ${where} GROUP BY operation`,
      params
    );

    const total = totals[0]?.total ?? 0;
    const successful = totals[0]?.successful ?? 0;
    const operationsByType: AuditSummary["operationsByType"] = {};
    for (const row of byType) {
      operationsByType[row.operation] = row.count;
    }

    return {
      totalOperations: total,
      successfulOperations: successful,
      failedOperations: total - successful,
      successRate: total > 0 ? successful / total : 0,
      operationsByType,
      uniqueUsers: totals[0]?.users ?? 0,
      uniqueTemplates: totals[0]?.templates ?? 0,
    };
  }
}
