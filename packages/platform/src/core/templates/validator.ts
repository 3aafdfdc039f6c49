/**
 * Structural Validator
 *
 * Decides whether a candidate template is well-formed before it is
 * admitted into the registry. Two passes:
 *
 *   1. Shape — the contracts' zod schema (types, lengths, enum membership,
 *      id format, semver, minimum counts).
 *   2. Graph — only on a well-shaped template: unique ids, exactly one
 *      initial state, at least one final state, known endpoints, no exits
 *      from final states, forward reachability, and a path to a final
 *      state from every reachable state.
 *
 * Pure and deterministic. Runs in O(states + transitions).
 */

import {
  PRIVILEGED_ACTIONS,
  ROLES,
  workflowTemplateSchema,
  type Action,
  type WorkflowTemplate,
} from "@curriflow/contracts";
import type { ZodIssue } from "zod";

/** Rule codes for violations that reject a template */
export type ValidationRule =
  | "schema"
  | "enum_membership"
  | "duplicate_state_id"
  | "duplicate_transition_id"
  | "single_initial_state"
  | "final_state_required"
  | "unknown_state_reference"
  | "final_state_outgoing"
  | "unreachable_state"
  | "dead_end_state";

/** Rule codes for findings that are reported but do not reject */
export type WarningRule =
  | "privileged_action"
  | "unenforced_condition"
  | "state_without_permissions";

export interface ValidationIssue<R extends string = ValidationRule> {
  rule: R;
  message: string;
  /** Dotted location within the template, when one applies */
  path?: string;
}

export type ValidationWarning = ValidationIssue<WarningRule>;

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationWarning[];
  /** The parsed template (defaults applied), present only when valid */
  template?: WorkflowTemplate;
}

/** Condition keys the engine evaluates at transition time */
export const ENFORCED_CONDITIONS = ["requireComments", "minContentLength"] as const;

function isEnforcedCondition(key: string): boolean {
  return ENFORCED_CONDITIONS.some((enforced) => enforced === key);
}

function fromZodIssue(issue: ZodIssue): ValidationIssue {
  return {
    rule: issue.code === "invalid_enum_value" ? "enum_membership" : "schema",
    message: issue.message,
    path: issue.path.length > 0 ? issue.path.join(".") : undefined,
  };
}

/**
 * Validates a candidate template.
 *
 * Never throws: every problem is reported in `errors` with its rule code,
 * and the caller decides what to do with an invalid result.
 */
export function validateTemplate(input: unknown): ValidationResult {
  const parsed = workflowTemplateSchema.safeParse(input);
  if (!parsed.success) {
    return {
      isValid: false,
      errors: parsed.error.issues.map(fromZodIssue),
      warnings: [],
    };
  }

  const template: WorkflowTemplate = parsed.data;
  const errors = checkGraph(template);
  const warnings = collectWarnings(template);

  if (errors.length > 0) {
    return { isValid: false, errors, warnings };
  }
  return { isValid: true, errors, warnings, template };
}

// ---------------------------------------------------------------------------
// Graph checks
// ---------------------------------------------------------------------------

function checkGraph(template: WorkflowTemplate): ValidationIssue[] {
  const errors: ValidationIssue[] = [];

  const stateIds = new Set<string>();
  template.states.forEach((state, index) => {
    if (stateIds.has(state.id)) {
      errors.push({
        rule: "duplicate_state_id",
        message: `Duplicate state ID "${state.id}"`,
        path: `states.${index}.id`,
      });
    }
    stateIds.add(state.id);
  });

  const transitionIds = new Set<string>();
  template.transitions.forEach((transition, index) => {
    if (transitionIds.has(transition.id)) {
      errors.push({
        rule: "duplicate_transition_id",
        message: `Duplicate transition ID "${transition.id}"`,
        path: `transitions.${index}.id`,
      });
    }
    transitionIds.add(transition.id);
  });

  const initialStates = template.states.filter((s) => s.isInitial);
  if (initialStates.length !== 1) {
    errors.push({
      rule: "single_initial_state",
      message: `Workflow must have exactly one initial state, found ${initialStates.length}`,
    });
  }

  const finalIds = new Set(template.states.filter((s) => s.isFinal).map((s) => s.id));
  if (finalIds.size === 0) {
    errors.push({
      rule: "final_state_required",
      message: "Workflow must have at least one final state",
    });
  }

  template.transitions.forEach((transition, index) => {
    for (const end of ["fromState", "toState"] as const) {
      if (!stateIds.has(transition[end])) {
        errors.push({
          rule: "unknown_state_reference",
          message: `Transition "${transition.id}" references unknown state "${transition[end]}"`,
          path: `transitions.${index}.${end}`,
        });
      }
    }
    if (finalIds.has(transition.fromState)) {
      errors.push({
        rule: "final_state_outgoing",
        message: `Transition "${transition.id}" leaves final state "${transition.fromState}"`,
        path: `transitions.${index}.fromState`,
      });
    }
  });

  // Edges between known states only; unknown endpoints are already reported.
  const forward = new Map<string, string[]>();
  const reverse = new Map<string, string[]>();
  for (const t of template.transitions) {
    if (!stateIds.has(t.fromState) || !stateIds.has(t.toState)) continue;
    forward.set(t.fromState, [...(forward.get(t.fromState) ?? []), t.toState]);
    reverse.set(t.toState, [...(reverse.get(t.toState) ?? []), t.fromState]);
  }

  let reachable: Set<string> = stateIds;
  if (initialStates.length === 1) {
    reachable = traverse([initialStates[0].id], forward);
    for (const state of template.states) {
      if (!reachable.has(state.id)) {
        errors.push({
          rule: "unreachable_state",
          message: `State "${state.id}" is not reachable from initial state "${initialStates[0].id}"`,
        });
      }
    }
  }

  if (finalIds.size > 0) {
    const canFinish = traverse([...finalIds], reverse);
    for (const state of template.states) {
      if (reachable.has(state.id) && !canFinish.has(state.id)) {
        errors.push({
          rule: "dead_end_state",
          message: `State "${state.id}" has no path to a final state`,
        });
      }
    }
  }

  return errors;
}

/** Breadth-first closure of `start` over `edges` */
function traverse(start: string[], edges: Map<string, string[]>): Set<string> {
  const seen = new Set(start);
  const queue = [...start];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const next of edges.get(current) ?? []) {
      if (!seen.has(next)) {
        seen.add(next);
        queue.push(next);
      }
    }
  }
  return seen;
}

// ---------------------------------------------------------------------------
// Warnings
// ---------------------------------------------------------------------------

function privileged(actions: readonly Action[]): Action[] {
  return actions.filter((a) => PRIVILEGED_ACTIONS.includes(a));
}

function collectWarnings(template: WorkflowTemplate): ValidationWarning[] {
  const warnings: ValidationWarning[] = [];

  template.states.forEach((state, index) => {
    if (state.permissions.length === 0 && !state.isFinal) {
      warnings.push({
        rule: "state_without_permissions",
        message: `State "${state.id}" grants no actions to any role`,
        path: `states.${index}.permissions`,
      });
    }
    for (const permission of state.permissions) {
      const granted = privileged(permission.actions);
      if (permission.role !== "administrator" && granted.length > 0) {
        warnings.push({
          rule: "privileged_action",
          message: `Role "${permission.role}" is granted ${granted.join(", ")} in state "${state.id}"`,
          path: `states.${index}.permissions`,
        });
      }
    }
  });

  for (const role of ROLES) {
    const granted = privileged(template.defaultPermissions[role] ?? []);
    if (role !== "administrator" && granted.length > 0) {
      warnings.push({
        rule: "privileged_action",
        message: `Role "${role}" is granted ${granted.join(", ")} by default permissions`,
        path: `defaultPermissions.${role}`,
      });
    }
  }

  template.transitions.forEach((transition, index) => {
    for (const key of Object.keys(transition.conditions ?? {})) {
      if (!isEnforcedCondition(key)) {
        warnings.push({
          rule: "unenforced_condition",
          message: `Condition "${key}" on transition "${transition.id}" is not enforced by the engine`,
          path: `transitions.${index}.conditions.${key}`,
        });
      }
    }
  });

  return warnings;
}
