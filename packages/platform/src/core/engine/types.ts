/**
 * Workflow Engine — request and result types
 */

import type {
  Action,
  AuditSink,
  ContentStore,
  HistoryEntry,
  InstanceStore,
  Logger,
  Notifier,
  Role,
  RoleAssignments,
  StateType,
} from "@curriflow/contracts";
import type { EngineErrorType } from "./errors.js";

/**
 * The result of an engine operation.
 * Always includes success status — callers should check this.
 * On failure, errorType identifies the category for HTTP mapping.
 */
export type EngineResult<T> =
  | { success: true; data: T }
  | {
      success: false;
      error: string;
      errorType: EngineErrorType;
      details?: Record<string, unknown>;
    };

export type EngineFailure = Extract<EngineResult<never>, { success: false }>;

export interface WorkflowEngineOptions {
  contentStore: ContentStore;
  notifier: Notifier;
  auditSink: AuditSink;
  /** Defaults to an InMemoryInstanceStore */
  store?: InstanceStore;
  logger?: Logger;
  /** Bound on every collaborator call (default 5000ms) */
  collaboratorTimeoutMs?: number;
  /** Audit entries kept for redelivery after a sink failure (default 1000) */
  auditBacklogLimit?: number;
  /** Default worker count for bulkApplyTemplate (default 5) */
  bulkMaxConcurrency?: number;
  clock?: () => Date;
  /** Audit entry ids (default crypto.randomUUID) */
  idGenerator?: () => string;
}

export interface OperationOptions {
  /** Cancels the operation while it is still waiting for its content's lock */
  signal?: AbortSignal;
}

export interface TransitionSummary {
  id: string;
  title: string;
  toState: string;
  requiredRole: Role;
}

export interface InstanceSummary {
  contentUid: string;
  templateId: string;
  templateName: string;
  currentState: string;
  roleAssignments: RoleAssignments;
  appliedAt: string;
  appliedBy: string;
  hasBackup: boolean;
}

// ---------------------------------------------------------------------------
// applyTemplate
// ---------------------------------------------------------------------------

export interface ApplyTemplateRequest {
  templateId: string;
  contentUid: string;
  roleAssignments: RoleAssignments;
  actingUserId: string;
  /** Replace an existing instance instead of failing with a conflict */
  force?: boolean;
  /** With force, keep what is being replaced so removal can restore it */
  backupExisting?: boolean;
}

export interface ApplyTemplateResult {
  instance: InstanceSummary;
  warnings: string[];
  /** The template that was replaced, when force was used */
  replacedTemplateId?: string;
  backupCaptured: boolean;
}

// ---------------------------------------------------------------------------
// executeTransition
// ---------------------------------------------------------------------------

export interface ExecuteTransitionRequest {
  contentUid: string;
  transitionId: string;
  actingUserId: string;
  actingRole: Role;
  comments?: string;
}

export interface ExecuteTransitionResult {
  contentUid: string;
  previousState: string;
  currentState: string;
  transitionId: string;
  historyEntry: HistoryEntry;
  /** Transitions out of the new state the acting role may execute */
  availableTransitions: TransitionSummary[];
  isFinal: boolean;
}

// ---------------------------------------------------------------------------
// removeTemplate
// ---------------------------------------------------------------------------

export interface RemoveTemplateRequest {
  contentUid: string;
  actingUserId: string;
  /** Restore the backup captured when this template was force-applied */
  restoreBackup?: boolean;
}

export interface RemoveTemplateResult {
  removedTemplateId: string;
  restoredBackup: boolean;
  restoredInstance?: InstanceSummary;
}

// ---------------------------------------------------------------------------
// getState
// ---------------------------------------------------------------------------

export interface ContentWorkflowState {
  contentUid: string;
  templateId: string;
  templateName: string;
  templateVersion: string;
  currentState: {
    id: string;
    title: string;
    stateType: StateType;
    isFinal: boolean;
    uiMetadata?: Readonly<Record<string, unknown>>;
  };
  availableTransitions: TransitionSummary[];
  availableActions: Action[];
  roleAssignments: RoleAssignments;
  history: HistoryEntry[];
  appliedAt: string;
  appliedBy: string;
  hasBackup: boolean;
}

// ---------------------------------------------------------------------------
// bulkApplyTemplate
// ---------------------------------------------------------------------------

export interface BulkApplyItem {
  contentUid: string;
  roleAssignments: RoleAssignments;
  force?: boolean;
  backupExisting?: boolean;
}

export interface BulkApplyRequest {
  templateId: string;
  items: BulkApplyItem[];
  actingUserId: string;
}

export interface BulkApplyOptions extends OperationOptions {
  maxConcurrent?: number;
}

export type BulkApplyItemResult =
  | { contentUid: string; success: true; warnings: string[] }
  | { contentUid: string; success: false; error: string; errorType: EngineErrorType };

export interface BulkApplyResult {
  templateId: string;
  total: number;
  successfulCount: number;
  failedCount: number;
  successRate: number;
  /** In the order of the request's items */
  results: BulkApplyItemResult[];
}
