/**
 * Workflow Audit Trail
 *
 * The recorder the engine writes through, and the sinks it can write to.
 */

export { AuditRecorder, type AuditRecorderOptions, type RetryResult } from "./recorder.js";
export { InMemoryAuditSink, summarizeEntries, DEFAULT_AUDIT_PAGE_SIZE } from "./memory-sink.js";
export { PostgresAuditSink, ensureAuditTable } from "./postgres-sink.js";
