/**
 * Workflow Engine
 *
 * The entry point for every workflow operation, whether triggered by the
 * REST adapter, a bulk job, or a test. Each mutating operation follows the
 * same pipeline:
 *
 *   1. Prepare — pure checks that need no lock (template lookup, roles)
 *   2. Acquire the content's exclusive section (KeyedMutex)
 *   3. Read the current snapshot, check, call collaborators (bounded)
 *   4. Commit a new frozen snapshot to the instance store
 *   5. Record exactly one audit entry, still inside the section
 *   6. Fire notifications and domain events without awaiting them
 *
 * Failures at any step are caught at the operation boundary, audited, and
 * returned as an EngineResult. Nothing is mutated when a step before the
 * commit fails.
 */

import { performance } from "node:perf_hooks";
import { randomUUID } from "node:crypto";
import {
  ACTIONS,
  ROLES,
  type AuditEntry,
  type AuditOperation,
  type AuditSink,
  type ChangeDescriptor,
  type ContentStore,
  type HistoryEntry,
  type InstanceBackup,
  type InstanceStore,
  type Logger,
  type Notifier,
  type Role,
  type RoleAssignments,
  type TemplateSummary,
  type WorkflowInstance,
  type WorkflowTemplate,
  type WorkflowNotification,
  type WorkflowTransition,
} from "@curriflow/contracts";
import {
  getTemplate,
  listTemplates,
  type TemplateFilters,
  type TemplateGraph,
} from "../templates/registry.js";
import {
  availableActions,
  canExecuteTransition,
  executableTransitions,
  templateRoles,
  transitionsFrom,
} from "../permissions/evaluator.js";
import { InMemoryInstanceStore } from "../instances/store.js";
import { KeyedMutex } from "../instances/keyed-mutex.js";
import { AuditRecorder } from "../audit/recorder.js";
import { publish } from "../event-bus/index.js";
import { createLogger, logOperation } from "../logging/index.js";
import { captureException } from "../observability/index.js";
import { withTimeout } from "../utils/timeout.js";
import {
  CollaboratorError,
  ConditionNotMetError,
  ConflictError,
  InvalidTransitionError,
  NotFoundError,
  PermissionDeniedError,
  RoleAssignmentError,
  WorkflowError,
} from "./errors.js";
import type {
  ApplyTemplateRequest,
  ApplyTemplateResult,
  BulkApplyItemResult,
  BulkApplyOptions,
  BulkApplyRequest,
  BulkApplyResult,
  ContentWorkflowState,
  EngineFailure,
  EngineResult,
  ExecuteTransitionRequest,
  ExecuteTransitionResult,
  InstanceSummary,
  OperationOptions,
  RemoveTemplateRequest,
  RemoveTemplateResult,
  TransitionSummary,
  WorkflowEngineOptions,
} from "./types.js";

/** What an operation will write to its audit entry */
interface AuditDraft {
  operation: AuditOperation;
  contentUid: string;
  userId: string;
  templateId: string | null;
  changes: ChangeDescriptor[];
}

function summarizeTransition(transition: WorkflowTransition): TransitionSummary {
  return {
    id: transition.id,
    title: transition.title,
    toState: transition.toState,
    requiredRole: transition.requiredRole,
  };
}

function withoutBackup(instance: Readonly<WorkflowInstance>): Omit<WorkflowInstance, "backup"> {
  return {
    contentUid: instance.contentUid,
    templateId: instance.templateId,
    currentState: instance.currentState,
    roleAssignments: instance.roleAssignments,
    history: instance.history,
    appliedAt: instance.appliedAt,
    appliedBy: instance.appliedBy,
  };
}

/** Copies assignments, keeping only roles with at least one user */
function normalizeAssignments(assignments: RoleAssignments): RoleAssignments {
  const normalized: RoleAssignments = {};
  for (const role of ROLES) {
    const users = assignments[role]?.filter((u) => u.trim() !== "");
    if (users && users.length > 0) normalized[role] = [...new Set(users)];
  }
  return normalized;
}

function roleChanges(previous: RoleAssignments, next: RoleAssignments): ChangeDescriptor[] {
  const changes: ChangeDescriptor[] = [];
  for (const role of ROLES) {
    const before = previous[role] ?? [];
    const after = next[role] ?? [];
    const added = after.filter((u) => !before.includes(u));
    const removed = before.filter((u) => !after.includes(u));
    if (added.length > 0) changes.push({ type: "role_added", role, users: added });
    if (removed.length > 0) changes.push({ type: "role_removed", role, users: removed });
  }
  return changes;
}

export class WorkflowEngine {
  readonly store: InstanceStore;
  readonly auditSink: AuditSink;
  readonly audit: AuditRecorder;
  private readonly contentStore: ContentStore;
  private readonly notifier: Notifier;
  private readonly logger: Logger;
  private readonly collaboratorTimeoutMs: number;
  private readonly bulkMaxConcurrency: number;
  private readonly clock: () => Date;
  private readonly newId: () => string;
  private readonly mutex = new KeyedMutex();
  private readonly inFlight = new Set<Promise<void>>();

  constructor(options: WorkflowEngineOptions) {
    this.store = options.store ?? new InMemoryInstanceStore();
    this.contentStore = options.contentStore;
    this.notifier = options.notifier;
    this.auditSink = options.auditSink;
    this.logger = options.logger ?? createLogger("workflow-engine");
    this.collaboratorTimeoutMs = options.collaboratorTimeoutMs ?? 5_000;
    this.bulkMaxConcurrency = options.bulkMaxConcurrency ?? 5;
    this.clock = options.clock ?? (() => new Date());
    this.newId = options.idGenerator ?? randomUUID;
    this.audit = new AuditRecorder(options.auditSink, {
      logger: this.logger,
      timeoutMs: this.collaboratorTimeoutMs,
      backlogLimit: options.auditBacklogLimit,
    });
  }

  // ---------------------------------------------------------------------------
  // Template reads
  // ---------------------------------------------------------------------------

  listTemplates(filters: TemplateFilters = {}): EngineResult<TemplateSummary[]> {
    return { success: true, data: listTemplates(filters) };
  }

  getTemplate(templateId: string): EngineResult<WorkflowTemplate> {
    const graph = getTemplate(templateId);
    if (!graph) return this.failure(new NotFoundError("template", templateId));
    return { success: true, data: graph.template };
  }

  // ---------------------------------------------------------------------------
  // applyTemplate
  // ---------------------------------------------------------------------------

  async applyTemplate(
    request: ApplyTemplateRequest,
    options: OperationOptions = {}
  ): Promise<EngineResult<ApplyTemplateResult>> {
    const { templateId, contentUid, actingUserId } = request;
    const draft = this.draft("apply_template", contentUid, actingUserId, templateId);

    return this.runOperation(
      draft,
      options.signal,
      () => {
        const graph = getTemplate(templateId);
        if (!graph) {
          draft.templateId = null;
          throw new NotFoundError("template", templateId);
        }
        const roleWarnings = this.checkRoleAssignments(graph.template, request.roleAssignments);
        return { graph, roleWarnings };
      },
      async ({ graph, roleWarnings }) => {
        const existing = this.store.get(contentUid);
        if (existing && !request.force) {
          throw new ConflictError(
            `Content "${contentUid}" already has template "${existing.templateId}" applied`,
            { existingTemplateId: existing.templateId, appliedAt: existing.appliedAt }
          );
        }

        let backup: InstanceBackup | undefined;
        if (existing && request.backupExisting) {
          const nativeState = await this.callCollaborator("getNativeWorkflowState", () =>
            this.contentStore.getNativeWorkflowState(contentUid)
          );
          backup = {
            previousInstance: withoutBackup(existing),
            nativeState,
            capturedAt: this.now(),
          };
        }

        const roleAssignments = normalizeAssignments(request.roleAssignments);
        const instance = this.store.put({
          contentUid,
          templateId,
          currentState: graph.initialStateId,
          roleAssignments,
          history: [],
          appliedAt: this.now(),
          appliedBy: actingUserId,
          ...(backup ? { backup } : {}),
        });

        draft.changes.push(
          ...roleChanges(existing?.roleAssignments ?? {}, roleAssignments),
          { type: "state_set", to: graph.initialStateId }
        );
        if (backup) draft.changes.push({ type: "backup_captured" });

        return {
          data: {
            instance: this.summarizeInstance(instance, graph),
            warnings: [...graph.warnings.map((w) => w.message), ...roleWarnings],
            ...(existing ? { replacedTemplateId: existing.templateId } : {}),
            backupCaptured: backup !== undefined,
          },
          after: () => {
            this.track(
              publish({
                type: "workflow.template_applied",
                payload: {
                  contentUid,
                  templateId,
                  initialState: graph.initialStateId,
                  appliedBy: actingUserId,
                  replacedTemplateId: existing?.templateId ?? null,
                },
              })
            );
          },
        };
      }
    );
  }

  // ---------------------------------------------------------------------------
  // executeTransition
  // ---------------------------------------------------------------------------

  async executeTransition(
    request: ExecuteTransitionRequest,
    options: OperationOptions = {}
  ): Promise<EngineResult<ExecuteTransitionResult>> {
    const { contentUid, transitionId, actingUserId, actingRole } = request;
    const draft = this.draft("execute_transition", contentUid, actingUserId, null);

    return this.runOperation(
      draft,
      options.signal,
      () => undefined,
      async () => {
        const instance = this.store.get(contentUid);
        if (!instance) throw new NotFoundError("instance", contentUid);
        draft.templateId = instance.templateId;

        const graph = this.graphFor(instance);
        const transition = graph.transitionsById.get(transitionId);
        if (!transition) {
          throw new NotFoundError("transition", transitionId, { templateId: instance.templateId });
        }

        if (transition.fromState !== instance.currentState) {
          throw new InvalidTransitionError(
            transitionId,
            transition.fromState,
            instance.currentState,
            transitionsFrom(graph, instance.currentState).map((t) => t.id)
          );
        }

        if (!canExecuteTransition(graph, transition, actingRole)) {
          throw new PermissionDeniedError(transitionId, transition.requiredRole, actingRole);
        }

        const comments = request.comments?.trim() || undefined;
        await this.checkConditions(transition, contentUid, comments);

        const historyEntry: HistoryEntry = {
          timestamp: this.now(),
          fromState: transition.fromState,
          toState: transition.toState,
          transitionId,
          userId: actingUserId,
          role: actingRole,
          ...(comments ? { comments } : {}),
        };
        this.store.put({
          ...instance,
          currentState: transition.toState,
          history: [...instance.history, historyEntry],
        });
        draft.changes.push({
          type: "state_changed",
          from: transition.fromState,
          to: transition.toState,
          transitionId,
        });

        const target = graph.statesById.get(transition.toState);
        const isFinal = target?.isFinal ?? false;

        return {
          data: {
            contentUid,
            previousState: transition.fromState,
            currentState: transition.toState,
            transitionId,
            historyEntry,
            availableTransitions: executableTransitions(graph, transition.toState, actingRole).map(
              summarizeTransition
            ),
            isFinal,
          },
          after: () => {
            const recipients = this.recipientsFor(graph, instance.roleAssignments, transition.toState, actingUserId);
            if (recipients.length > 0) {
              this.track(
                this.deliverNotification(recipients, {
                  type: "workflow.transitioned",
                  contentUid,
                  templateId: instance.templateId,
                  message: `"${transition.title}" moved content to ${target?.title ?? transition.toState}`,
                  data: {
                    fromState: transition.fromState,
                    toState: transition.toState,
                    transitionId,
                    actingUserId,
                    actingRole,
                    isFinal,
                  },
                })
              );
            }
            this.track(
              publish({
                type: "workflow.transitioned",
                payload: {
                  contentUid,
                  templateId: instance.templateId,
                  fromState: transition.fromState,
                  toState: transition.toState,
                  transitionId,
                  userId: actingUserId,
                  role: actingRole,
                  isFinal,
                },
              })
            );
          },
        };
      }
    );
  }

  // ---------------------------------------------------------------------------
  // removeTemplate
  // ---------------------------------------------------------------------------

  async removeTemplate(
    request: RemoveTemplateRequest,
    options: OperationOptions = {}
  ): Promise<EngineResult<RemoveTemplateResult>> {
    const { contentUid, actingUserId } = request;
    const draft = this.draft("remove_template", contentUid, actingUserId, null);

    return this.runOperation(
      draft,
      options.signal,
      () => undefined,
      async () => {
        const instance = this.store.get(contentUid);
        if (!instance) throw new NotFoundError("instance", contentUid);
        draft.templateId = instance.templateId;

        const backup = request.restoreBackup ? instance.backup : undefined;
        let restoredInstance: InstanceSummary | undefined;

        if (backup) {
          // Native state first: if the content store refuses, nothing has changed yet.
          await this.callCollaborator("setNativeWorkflowState", () =>
            this.contentStore.setNativeWorkflowState(contentUid, backup.nativeState)
          );
          const previous = backup.previousInstance;
          if (previous) {
            const restored = this.store.put({ ...previous });
            const previousGraph = getTemplate(previous.templateId);
            restoredInstance = previousGraph
              ? this.summarizeInstance(restored, previousGraph)
              : undefined;
          } else {
            this.store.delete(contentUid);
          }
        } else {
          this.store.delete(contentUid);
        }

        draft.changes.push({
          type: "instance_removed",
          templateId: instance.templateId,
          state: instance.currentState,
        });
        if (backup) {
          draft.changes.push({
            type: "backup_restored",
            templateId: backup.previousInstance?.templateId ?? null,
            state: backup.previousInstance?.currentState ?? null,
          });
        }

        return {
          data: {
            removedTemplateId: instance.templateId,
            restoredBackup: backup !== undefined,
            ...(restoredInstance ? { restoredInstance } : {}),
          },
        };
      }
    );
  }

  // ---------------------------------------------------------------------------
  // getState
  // ---------------------------------------------------------------------------

  /** Snapshot read; takes no lock and writes no audit entry */
  getState(contentUid: string, requestingRole: Role): EngineResult<ContentWorkflowState> {
    try {
      const instance = this.store.get(contentUid);
      if (!instance) throw new NotFoundError("instance", contentUid);

      const graph = this.graphFor(instance);
      const state = graph.statesById.get(instance.currentState);
      if (!state) {
        throw new WorkflowError(
          `State "${instance.currentState}" is not defined in template "${instance.templateId}"`,
          "unknown"
        );
      }

      const actions = availableActions(graph, state.id, requestingRole);

      return {
        success: true,
        data: {
          contentUid,
          templateId: graph.template.id,
          templateName: graph.template.name,
          templateVersion: graph.template.version,
          currentState: {
            id: state.id,
            title: state.title,
            stateType: state.stateType,
            isFinal: state.isFinal,
            ...(state.uiMetadata ? { uiMetadata: state.uiMetadata } : {}),
          },
          availableTransitions: executableTransitions(graph, state.id, requestingRole).map(
            summarizeTransition
          ),
          availableActions: ACTIONS.filter((a) => actions.has(a)),
          roleAssignments: instance.roleAssignments,
          history: instance.history,
          appliedAt: instance.appliedAt,
          appliedBy: instance.appliedBy,
          hasBackup: instance.backup !== undefined,
        },
      };
    } catch (error) {
      return this.failure(error, contentUid);
    }
  }

  // ---------------------------------------------------------------------------
  // bulkApplyTemplate
  // ---------------------------------------------------------------------------

  /**
   * Applies one template to many content items with a bounded worker pool.
   * Each item is a full applyTemplate call with its own lock and audit entry.
   */
  async bulkApplyTemplate(
    request: BulkApplyRequest,
    options: BulkApplyOptions = {}
  ): Promise<EngineResult<BulkApplyResult>> {
    const { templateId, items, actingUserId } = request;
    const maxConcurrent = options.maxConcurrent ?? this.bulkMaxConcurrency;

    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      return this.failure(
        new WorkflowError("maxConcurrent must be a positive integer", "validation", { maxConcurrent })
      );
    }
    if (!getTemplate(templateId)) {
      return this.failure(new NotFoundError("template", templateId));
    }

    const results: BulkApplyItemResult[] = new Array(items.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < items.length) {
        const index = next++;
        const item = items[index];
        const result = await this.applyTemplate(
          { templateId, actingUserId, ...item },
          { signal: options.signal }
        );
        results[index] = result.success
          ? { contentUid: item.contentUid, success: true, warnings: result.data.warnings }
          : {
              contentUid: item.contentUid,
              success: false,
              error: result.error,
              errorType: result.errorType,
            };
      }
    };

    await Promise.all(
      Array.from({ length: Math.min(maxConcurrent, items.length) }, () => worker())
    );

    const successfulCount = results.filter((r) => r.success).length;
    this.logger.info("Bulk template application finished", {
      templateId,
      total: items.length,
      successfulCount,
    });

    return {
      success: true,
      data: {
        templateId,
        total: items.length,
        successfulCount,
        failedCount: items.length - successfulCount,
        successRate: items.length > 0 ? successfulCount / items.length : 0,
        results,
      },
    };
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /** Waits for in-flight notifications and events to settle */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  // ---------------------------------------------------------------------------
  // Pipeline
  // ---------------------------------------------------------------------------

  private async runOperation<P, T>(
    draft: AuditDraft,
    signal: AbortSignal | undefined,
    prepare: () => P,
    locked: (prepared: P) => Promise<{ data: T; after?: () => void }>
  ): Promise<EngineResult<T>> {
    const startTime = performance.now();

    try {
      const prepared = prepare();
      const data = await this.mutex.runExclusive(
        draft.contentUid,
        async () => {
          const outcome = await locked(prepared);
          await this.audit.record(this.auditEntry(draft, true));
          outcome.after?.();
          return outcome.data;
        },
        signal,
        draft.operation
      );

      logOperation(draft.operation, draft.contentUid, Math.round(performance.now() - startTime), true);
      return { success: true, data };
    } catch (error) {
      const failure = this.failure(error, draft.contentUid);
      logOperation(
        draft.operation,
        draft.contentUid,
        Math.round(performance.now() - startTime),
        false,
        failure.error
      );
      await this.audit.record(
        this.auditEntry(
          { ...draft, changes: [] },
          false,
          error instanceof Error ? error.message : failure.error,
          failure.errorType
        )
      );
      return failure;
    }
  }

  /** Converts a thrown value into a failed EngineResult */
  private failure(error: unknown, contentUid?: string): EngineFailure {
    if (error instanceof WorkflowError) {
      return {
        success: false,
        error: error.message,
        errorType: error.errorType,
        ...(error.details ? { details: error.details } : {}),
      };
    }

    // Unknown error — log full details server-side, return generic message
    this.logger.error("Workflow operation failed", {
      contentUid,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    captureException(error instanceof Error ? error : new Error(String(error)), { contentUid });

    return {
      success: false,
      error: "An unexpected error occurred",
      errorType: "unknown",
    };
  }

  private draft(
    operation: AuditOperation,
    contentUid: string,
    userId: string,
    templateId: string | null
  ): AuditDraft {
    return { operation, contentUid, userId, templateId, changes: [] };
  }

  private auditEntry(
    draft: AuditDraft,
    success: boolean,
    error?: string,
    errorType?: string
  ): AuditEntry {
    return {
      id: this.newId(),
      timestamp: this.now(),
      operation: draft.operation,
      userId: draft.userId,
      contentUid: draft.contentUid,
      templateId: draft.templateId,
      success,
      changes: draft.changes,
      ...(error ? { error } : {}),
      ...(errorType ? { errorType } : {}),
    };
  }

  // ---------------------------------------------------------------------------
  // Checks
  // ---------------------------------------------------------------------------

  /**
   * Every role the template references needs at least one user, and no
   * assigned role may be empty. Returns warnings for assigned roles the
   * template never uses.
   */
  private checkRoleAssignments(template: WorkflowTemplate, assignments: RoleAssignments): string[] {
    const required = templateRoles(template);
    const missingRoles = ROLES.filter((r) => required.has(r) && assignments[r] === undefined);
    const emptyRoles = ROLES.filter((r) => {
      const users = assignments[r];
      return users !== undefined && users.filter((u) => u.trim() !== "").length === 0;
    });

    if (missingRoles.length > 0 || emptyRoles.length > 0) {
      throw new RoleAssignmentError(missingRoles, emptyRoles);
    }

    return ROLES.filter((r) => assignments[r] !== undefined && !required.has(r)).map(
      (r) => `Role "${r}" is assigned but not used by template "${template.id}"`
    );
  }

  private async checkConditions(
    transition: WorkflowTransition,
    contentUid: string,
    comments: string | undefined
  ): Promise<void> {
    const conditions = transition.conditions;
    if (!conditions) return;

    if (conditions.requireComments && !comments) {
      throw new ConditionNotMetError(transition.id, "requireComments", "comments are required");
    }

    const minLength = conditions.minContentLength;
    if (minLength !== undefined && minLength > 0) {
      const length = await this.callCollaborator("getContentLength", () =>
        this.contentStore.getContentLength(contentUid)
      );
      if (length < minLength) {
        throw new ConditionNotMetError(
          transition.id,
          "minContentLength",
          `content length ${length} is below the required ${minLength}`,
          { required: minLength, actual: length }
        );
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Collaborators
  // ---------------------------------------------------------------------------

  private async callCollaborator<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(call(), this.collaboratorTimeoutMs, operation);
    } catch (error) {
      throw new CollaboratorError(operation, error instanceof Error ? error.message : String(error));
    }
  }

  /**
   * Users who should hear about arriving in `stateId`: those who can act
   * next, or everyone assigned when the state is final. Never the actor.
   */
  private recipientsFor(
    graph: TemplateGraph,
    assignments: RoleAssignments,
    stateId: string,
    actingUserId: string
  ): string[] {
    const roles = graph.statesById.get(stateId)?.isFinal
      ? ROLES.filter((r) => assignments[r] !== undefined)
      : [...new Set(transitionsFrom(graph, stateId).map((t) => t.requiredRole))];

    const recipients = new Set<string>();
    for (const role of roles) {
      for (const user of assignments[role] ?? []) {
        if (user !== actingUserId) recipients.add(user);
      }
    }
    return [...recipients];
  }

  private async deliverNotification(
    recipients: string[],
    event: WorkflowNotification
  ): Promise<void> {
    try {
      await withTimeout(this.notifier.notify(recipients, event), this.collaboratorTimeoutMs, "notify");
    } catch (error) {
      this.logger.warn("Notification delivery failed", {
        contentUid: event.contentUid,
        recipients,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /** Keeps a fire-and-forget task visible to drain() */
  private track(task: Promise<void>): void {
    const tracked = task.catch((error: unknown) => {
      this.logger.error("Background workflow task failed", {
        error: error instanceof Error ? error.message : String(error),
      });
    });
    this.inFlight.add(tracked);
    void tracked.finally(() => this.inFlight.delete(tracked));
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private graphFor(instance: Readonly<WorkflowInstance>): TemplateGraph {
    const graph = getTemplate(instance.templateId);
    if (!graph) throw new NotFoundError("template", instance.templateId);
    return graph;
  }

  private summarizeInstance(instance: Readonly<WorkflowInstance>, graph: TemplateGraph): InstanceSummary {
    return {
      contentUid: instance.contentUid,
      templateId: instance.templateId,
      templateName: graph.template.name,
      currentState: instance.currentState,
      roleAssignments: instance.roleAssignments,
      appliedAt: instance.appliedAt,
      appliedBy: instance.appliedBy,
      hasBackup: instance.backup !== undefined,
    };
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
