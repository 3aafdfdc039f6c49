/**
 * Permission Evaluator
 *
 * Answers "what may this role do here?" against a compiled template.
 * Pure functions over immutable graphs; no I/O, no locking.
 *
 * Resolution for a (state, role) pair:
 *   1. The state's explicit permission entry for the role, if any
 *   2. Otherwise the template's defaultPermissions for the role
 *   3. Otherwise nothing
 *
 * Explicit entries replace the defaults rather than extending them.
 */

import type { Action, Role, WorkflowTemplate, WorkflowTransition } from "@curriflow/contracts";
import type { TemplateGraph } from "../templates/registry.js";

/**
 * Actions a role may perform while content sits in a state.
 * Unknown states yield an empty set.
 */
export function availableActions(graph: TemplateGraph, stateId: string, role: Role): Set<Action> {
  const state = graph.statesById.get(stateId);
  if (!state) return new Set();

  const explicit = state.permissions.find((p) => p.role === role);
  if (explicit) return new Set(explicit.actions);

  return new Set(graph.template.defaultPermissions[role] ?? []);
}

/** Transitions leaving a state. Empty for final and unknown states. */
export function transitionsFrom(graph: TemplateGraph, stateId: string): readonly WorkflowTransition[] {
  return graph.outgoing.get(stateId) ?? [];
}

/**
 * Whether the role holds `manage_workflow` in the state, which lets it
 * execute any transition out of that state regardless of requiredRole.
 */
export function hasAdministrativeOverride(graph: TemplateGraph, stateId: string, role: Role): boolean {
  return availableActions(graph, stateId, role).has("manage_workflow");
}

export function canExecuteTransition(
  graph: TemplateGraph,
  transition: WorkflowTransition,
  role: Role
): boolean {
  return (
    transition.requiredRole === role ||
    hasAdministrativeOverride(graph, transition.fromState, role)
  );
}

/** Transitions out of a state the role may legally execute */
export function executableTransitions(
  graph: TemplateGraph,
  stateId: string,
  role: Role
): WorkflowTransition[] {
  return transitionsFrom(graph, stateId).filter((t) => canExecuteTransition(graph, t, role));
}

/**
 * Roles the template actually references: those named in any state
 * permission and those required by any transition. Roles that appear
 * only in defaultPermissions are not counted.
 */
export function templateRoles(template: WorkflowTemplate): Set<Role> {
  const roles = new Set<Role>();
  for (const state of template.states) {
    for (const permission of state.permissions) {
      roles.add(permission.role);
    }
  }
  for (const transition of template.transitions) {
    roles.add(transition.requiredRole);
  }
  return roles;
}
