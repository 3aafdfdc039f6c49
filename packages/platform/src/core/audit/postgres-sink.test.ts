/**
 * Postgres Audit Sink Tests
 *
 * Exercises the SQL the sink builds, with a mocked database.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { AuditEntry } from "@curriflow/contracts";

const mockUnsafe = vi.fn();
vi.mock("../database/connection.js", () => ({
  getDatabase: () => ({ sql: { unsafe: mockUnsafe } }),
}));

import { PostgresAuditSink, ensureAuditTable } from "./postgres-sink.js";

const ENTRY: AuditEntry = {
  id: "7d9f1c3e-0000-4000-8000-000000000001",
  timestamp: "2026-03-01T10:00:00.000Z",
  operation: "execute_transition",
  userId: "alice",
  contentUid: "doc-1",
  templateId: "simple_review",
  success: false,
  changes: [],
  error: "Permission denied",
  errorType: "permission",
};

describe("PostgresAuditSink", () => {
  let sink: PostgresAuditSink;

  beforeEach(() => {
    mockUnsafe.mockReset();
    sink = new PostgresAuditSink();
  });

  it("inserts an entry idempotently with changes as JSON", async () => {
    mockUnsafe.mockResolvedValueOnce([]);

    await sink.append({
      ...ENTRY,
      success: true,
      changes: [{ type: "state_changed", from: "draft", to: "review", transitionId: "submit" }],
      error: undefined,
      errorType: undefined,
    });

    const [query, params] = mockUnsafe.mock.calls[0];
    expect(query).toContain("INSERT INTO workflow_audit_log");
    expect(query).toContain("ON CONFLICT (id) DO NOTHING");
    expect(params).toEqual([
      ENTRY.id,
      "2026-03-01T10:00:00.000Z",
      "execute_transition",
      "alice",
      "doc-1",
      "simple_review",
      true,
      '[{"type":"state_changed","from":"draft","to":"review","transitionId":"submit"}]',
      null,
      null,
    ]);
  });

  it("propagates database errors to the recorder", async () => {
    mockUnsafe.mockRejectedValueOnce(new Error("connection refused"));
    await expect(sink.append(ENTRY)).rejects.toThrow("connection refused");
  });

  it("queries without filters", async () => {
    mockUnsafe
      .mockResolvedValueOnce([{ count: 1 }])
      .mockResolvedValueOnce([
        {
          id: ENTRY.id,
          created_at: new Date("2026-03-01T10:00:00.000Z"),
          operation: "execute_transition",
          user_id: "alice",
          content_uid: "doc-1",
          template_id: "simple_review",
          success: false,
          changes: [],
          error: "Permission denied",
          error_type: "permission",
        },
      ]);

    const result = await sink.query();

    expect(mockUnsafe.mock.calls[0][0]).toContain("WHERE TRUE");
    expect(mockUnsafe.mock.calls[1][1]).toEqual([50, 0]);
    expect(result).toEqual({ data: [ENTRY], total: 1 });
  });

  it("builds numbered parameters for each filter", async () => {
    mockUnsafe.mockResolvedValueOnce([{ count: 0 }]).mockResolvedValueOnce([]);

    await sink.query({
      userId: "alice",
      operation: "apply_template",
      success: true,
      dateFrom: "2026-03-01",
      limit: 10,
      offset: 20,
    });

    expect(mockUnsafe.mock.calls[0][0]).toContain(
      "user_id = $1 AND operation = $2 AND success = $3 AND created_at >= $4"
    );
    expect(mockUnsafe.mock.calls[0][1]).toEqual(["alice", "apply_template", true, "2026-03-01"]);
    expect(mockUnsafe.mock.calls[1][0]).toContain("LIMIT $5 OFFSET $6");
    expect(mockUnsafe.mock.calls[1][1]).toEqual(["alice", "apply_template", true, "2026-03-01", 10, 20]);
  });

  it("summarizes totals and operation counts", async () => {
    mockUnsafe
      .mockResolvedValueOnce([{ total: 4, successful: 3, users: 2, templates: 1 }])
      .mockResolvedValueOnce([
        { operation: "apply_template", count: 1 },
        { operation: "execute_transition", count: 3 },
      ]);

    const summary = await sink.summary({ dateTo: "2026-04-01" });

    expect(mockUnsafe.mock.calls[0][1]).toEqual(["2026-04-01"]);
    expect(summary).toEqual({
      totalOperations: 4,
      successfulOperations: 3,
      failedOperations: 1,
      successRate: 0.75,
      operationsByType: { apply_template: 1, execute_transition: 3 },
      uniqueUsers: 2,
      uniqueTemplates: 1,
    });
  });
});

describe("ensureAuditTable", () => {
  it("creates the table and its indexes", async () => {
    mockUnsafe.mockReset();
    mockUnsafe.mockResolvedValue([]);

    await ensureAuditTable();

    expect(mockUnsafe).toHaveBeenCalledTimes(3);
    expect(mockUnsafe.mock.calls[0][0]).toContain("CREATE TABLE IF NOT EXISTS workflow_audit_log");
    expect(mockUnsafe.mock.calls[1][0]).toContain("idx_workflow_audit_log_content");
  });
});
