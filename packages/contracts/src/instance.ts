/**
 * Workflow Instances
 *
 * An instance is one content item's live position inside an applied
 * template. It is the only mutable data in the engine, and it is never
 * mutated in place: every change produces a new frozen snapshot that the
 * instance store swaps in atomically.
 */

import type { Role } from "./permission.js";
import type { NativeWorkflowSnapshot } from "./collaborators.js";

/** Users assigned to each role for one content item */
export type RoleAssignments = Partial<Record<Role, string[]>>;

/** One executed transition. History is append-only. */
export interface HistoryEntry {
  timestamp: string;
  fromState: string;
  toState: string;
  transitionId: string;
  userId: string;
  /** The role the user acted under */
  role: Role;
  comments?: string;
}

/**
 * Captured when a template is force-applied over an existing one,
 * so that removing the new template can restore what was there before.
 */
export interface InstanceBackup {
  /** The replaced instance, without its own backup */
  previousInstance?: Omit<WorkflowInstance, "backup">;
  /** The content store's own workflow state at the time of capture */
  nativeState: NativeWorkflowSnapshot;
  capturedAt: string;
}

export interface WorkflowInstance {
  contentUid: string;
  templateId: string;
  /** A state id valid within the referenced template */
  currentState: string;
  roleAssignments: RoleAssignments;
  history: HistoryEntry[];
  appliedAt: string;
  appliedBy: string;
  backup?: InstanceBackup;
}

/**
 * Storage for instances, keyed by content UID.
 *
 * Implementations hand out immutable snapshots: a reader never observes
 * a half-written instance. Mutual exclusion between writers of the same
 * key is the engine's job, not the store's.
 */
export interface InstanceStore {
  get(contentUid: string): Readonly<WorkflowInstance> | undefined;
  put(instance: WorkflowInstance): Readonly<WorkflowInstance>;
  delete(contentUid: string): boolean;
  list(): Readonly<WorkflowInstance>[];
  readonly size: number;
}
