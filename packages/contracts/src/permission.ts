/**
 * Roles and Actions
 *
 * The closed vocabularies a workflow template is written in.
 * A template may only grant ACTIONS to ROLES; anything else is rejected
 * by the structural validator when the template is loaded.
 */

/**
 * All roles a content workflow can reference.
 * How users come to hold a role is decided by the identity provider,
 * never by the engine.
 */
export const ROLES = [
  "author",
  "peer_reviewer",
  "editor",
  "subject_expert",
  "publisher",
  "administrator",
  "viewer",
] as const;

export type Role = (typeof ROLES)[number];

/**
 * All actions a role can be granted in a workflow state.
 * `manage_workflow` and `assign_roles` are administrative: holding
 * `manage_workflow` in a state lets a role execute any transition out of it.
 */
export const ACTIONS = [
  "view",
  "edit",
  "delete",
  "submit",
  "review",
  "approve",
  "publish",
  "reject",
  "retract",
  "manage_workflow",
  "assign_roles",
] as const;

export type Action = (typeof ACTIONS)[number];

/** Actions that should only be granted to administrators */
export const PRIVILEGED_ACTIONS: readonly Action[] = ["manage_workflow", "assign_roles"];

/** The type of caller invoking an operation */
export type CallerType = "human" | "system" | "service";

/** Type guard for values arriving from untyped sources (headers, query strings) */
export function isRole(value: unknown): value is Role {
  return typeof value === "string" && ROLES.some((role) => role === value);
}
