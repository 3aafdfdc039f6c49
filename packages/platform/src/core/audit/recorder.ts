/**
 * Audit Recorder
 *
 * Writes audit entries to the configured sink on behalf of the engine.
 *
 *   - Bounded — every append is wrapped in a timeout
 *   - Never throws — a failed append is logged, captured by observability,
 *     and parked in a bounded backlog; the operation being audited stands
 *   - At-least-once — retryPending() redelivers the backlog; sinks dedupe
 *     on the entry id
 */

import type { AuditEntry, AuditSink, Logger } from "@curriflow/contracts";
import { createLogger } from "../logging/index.js";
import { captureException } from "../observability/index.js";
import { withTimeout } from "../utils/timeout.js";

export interface AuditRecorderOptions {
  logger?: Logger;
  /** Per-append timeout (default 5000ms) */
  timeoutMs?: number;
  /** Maximum entries kept for redelivery; the oldest are dropped beyond it (default 1000) */
  backlogLimit?: number;
}

export interface RetryResult {
  delivered: number;
  remaining: number;
}

export class AuditRecorder {
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly backlogLimit: number;
  private backlog: AuditEntry[] = [];
  private retrying: Promise<RetryResult> | null = null;

  constructor(
    private readonly sink: AuditSink,
    options: AuditRecorderOptions = {}
  ) {
    this.logger = options.logger ?? createLogger("audit");
    this.timeoutMs = options.timeoutMs ?? 5_000;
    this.backlogLimit = options.backlogLimit ?? 1_000;
  }

  /**
   * Appends one entry. Resolves to false when the sink failed or timed out
   * and the entry was parked for retry.
   */
  async record(entry: AuditEntry): Promise<boolean> {
    try {
      await withTimeout(this.sink.append(entry), this.timeoutMs, "audit append");
      return true;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error("Failed to write audit entry", {
        auditId: entry.id,
        operation: entry.operation,
        contentUid: entry.contentUid,
        error: error.message,
      });
      captureException(error, {
        userId: entry.userId,
        contentUid: entry.contentUid,
        auditId: entry.id,
      });
      this.park(entry);
      return false;
    }
  }

  /**
   * Redelivers parked entries in their original order.
   * Concurrent calls share one pass.
   */
  retryPending(): Promise<RetryResult> {
    if (!this.retrying) {
      this.retrying = this.drainBacklog().finally(() => {
        this.retrying = null;
      });
    }
    return this.retrying;
  }

  /** Entries waiting for redelivery */
  get pendingCount(): number {
    return this.backlog.length;
  }

  private async drainBacklog(): Promise<RetryResult> {
    const pending = this.backlog;
    this.backlog = [];
    let delivered = 0;

    for (const entry of pending) {
      try {
        await withTimeout(this.sink.append(entry), this.timeoutMs, "audit append");
        delivered++;
      } catch (err) {
        this.logger.warn("Audit redelivery failed", {
          auditId: entry.id,
          error: err instanceof Error ? err.message : String(err),
        });
        this.park(entry);
      }
    }

    if (delivered > 0) {
      this.logger.info("Redelivered audit entries", { delivered, remaining: this.backlog.length });
    }
    return { delivered, remaining: this.backlog.length };
  }

  private park(entry: AuditEntry): void {
    this.backlog.push(entry);
    if (this.backlog.length > this.backlogLimit) {
      const dropped = this.backlog.splice(0, this.backlog.length - this.backlogLimit);
      this.logger.error("Audit backlog full, dropping oldest entries", {
        dropped: dropped.length,
        droppedIds: dropped.map((e) => e.id),
      });
    }
  }
}
