import { describe, it, expect, beforeEach } from "vitest";
import type { AuditEntry } from "@curriflow/contracts";
import { InMemoryAuditSink } from "./memory-sink.js";

function entry(overrides: Partial<AuditEntry>): AuditEntry {
  return {
    id: "a1",
    timestamp: "2026-03-01T10:00:00.000Z",
    operation: "execute_transition",
    userId: "u1",
    contentUid: "doc-1",
    templateId: "simple_review",
    success: true,
    changes: [],
    ...overrides,
  };
}

let sink: InMemoryAuditSink;

beforeEach(async () => {
  sink = new InMemoryAuditSink();
  await sink.append(entry({ id: "a1", operation: "apply_template", userId: "admin", timestamp: "2026-03-01T09:00:00.000Z" }));
  await sink.append(entry({ id: "a2", userId: "alice", timestamp: "2026-03-01T10:00:00.000Z" }));
  await sink.append(entry({ id: "a3", userId: "bob", success: false, timestamp: "2026-03-02T10:00:00.000Z" }));
  await sink.append(
    entry({ id: "a4", contentUid: "doc-2", templateId: null, userId: "bob", success: false, operation: "remove_template", timestamp: "2026-03-03T10:00:00.000Z" })
  );
});

describe("InMemoryAuditSink.append", () => {
  it("ignores a redelivered entry with the same id", async () => {
    await sink.append(entry({ id: "a2", userId: "alice" }));
    expect(sink.size).toBe(4);
  });

  it("stores frozen copies", async () => {
    expect(Object.isFrozen(sink.all()[0])).toBe(true);
  });
});

describe("InMemoryAuditSink.query", () => {
  it("returns everything newest first by default", async () => {
    const result = await sink.query();
    expect(result.total).toBe(4);
    expect(result.data.map((e) => e.id)).toEqual(["a4", "a3", "a2", "a1"]);
  });

  it("filters by user and success", async () => {
    const result = await sink.query({ userId: "bob", success: false });
    expect(result.data.map((e) => e.id)).toEqual(["a4", "a3"]);
  });

  it("filters by content, template and operation", async () => {
    expect((await sink.query({ contentUid: "doc-2" })).total).toBe(1);
    expect((await sink.query({ templateId: "simple_review" })).total).toBe(3);
    expect((await sink.query({ operation: "apply_template" })).data[0].id).toBe("a1");
  });

  it("filters by an inclusive date range", async () => {
    const result = await sink.query({
      dateFrom: "2026-03-01T10:00:00.000Z",
      dateTo: "2026-03-02T10:00:00.000Z",
    });
    expect(result.data.map((e) => e.id)).toEqual(["a3", "a2"]);
  });

  it("compares instants when timestamps differ in precision", async () => {
    const mixed = new InMemoryAuditSink();
    await mixed.append(entry({ id: "m1", timestamp: "2026-03-01T10:00:00.500Z" }));
    await mixed.append(entry({ id: "m2", timestamp: "2026-03-01T11:00:00Z" }));

    expect((await mixed.query({ dateTo: "2026-03-01T10:00:00Z" })).total).toBe(0);
    expect((await mixed.query({ dateFrom: "2026-03-01T11:00:00.000Z" })).data.map((e) => e.id)).toEqual(["m2"]);
    expect((await mixed.query({ dateTo: "2026-03-01T10:00:00.5Z" })).data.map((e) => e.id)).toEqual(["m1"]);
  });

  it("paginates after filtering", async () => {
    const result = await sink.query({ limit: 2, offset: 1 });
    expect(result.total).toBe(4);
    expect(result.data.map((e) => e.id)).toEqual(["a3", "a2"]);
  });
});

describe("InMemoryAuditSink.summary", () => {
  it("computes totals and distinct counts", async () => {
    expect(await sink.summary()).toEqual({
      totalOperations: 4,
      successfulOperations: 2,
      failedOperations: 2,
      successRate: 0.5,
      operationsByType: { apply_template: 1, execute_transition: 2, remove_template: 1 },
      uniqueUsers: 3,
      uniqueTemplates: 1,
    });
  });

  it("reports a zero success rate for an empty range", async () => {
    const summary = await sink.summary({ dateFrom: "2027-01-01T00:00:00.000Z" });
    expect(summary.totalOperations).toBe(0);
    expect(summary.successRate).toBe(0);
  });
});
