/**
 * Workflow Errors
 *
 * Every failure the engine can report is a WorkflowError subclass carrying
 * an errorType (for HTTP mapping and audit) and structured details.
 * The engine catches these at the operation boundary and turns them into
 * an EngineResult; nothing outside the engine sees them thrown, except
 * StructuralValidationError, which is raised at template load time.
 */

import type { Role } from "@curriflow/contracts";
import type { ValidationIssue } from "../templates/validator.js";

/**
 * Error categories for structured error handling.
 * The REST adapter maps these to HTTP status codes:
 *   not_found          → 404
 *   validation         → 400
 *   permission         → 403
 *   conflict           → 409
 *   invalid_transition → 409
 *   condition_not_met  → 422
 *   collaborator       → 502
 *   cancelled          → 499
 *   unknown            → 500
 */
export type EngineErrorType =
  | "not_found"
  | "validation"
  | "permission"
  | "conflict"
  | "invalid_transition"
  | "condition_not_met"
  | "collaborator"
  | "cancelled"
  | "unknown";

export class WorkflowError extends Error {
  public readonly errorType: EngineErrorType;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, errorType: EngineErrorType, details?: Record<string, unknown>) {
    super(message);
    this.name = "WorkflowError";
    this.errorType = errorType;
    this.details = details;
  }
}

/**
 * Thrown when a template fails structural validation.
 * Lists every violation, not only the first.
 */
export class StructuralValidationError extends WorkflowError {
  public readonly errors: ValidationIssue[];

  constructor(templateId: string | undefined, errors: ValidationIssue[]) {
    const label = templateId ? `Template "${templateId}"` : "Template";
    super(
      `${label} failed structural validation: ` +
        errors.map((e) => `[${e.rule}] ${e.message}`).join("; "),
      "validation",
      { errors }
    );
    this.name = "StructuralValidationError";
    this.errors = errors;
  }
}

export class NotFoundError extends WorkflowError {
  constructor(kind: "template" | "instance" | "transition", id: string, details?: Record<string, unknown>) {
    const message =
      kind === "instance"
        ? `No workflow template is applied to content "${id}"`
        : `${kind === "template" ? "Template" : "Transition"} "${id}" not found`;
    super(message, "not_found", details);
    this.name = "NotFoundError";
  }
}

export class ConflictError extends WorkflowError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "conflict", details);
    this.name = "ConflictError";
  }
}

/** Role assignments incompatible with the template being applied */
export class RoleAssignmentError extends WorkflowError {
  public readonly missingRoles: Role[];
  public readonly emptyRoles: Role[];

  constructor(missingRoles: Role[], emptyRoles: Role[]) {
    const parts: string[] = [];
    if (missingRoles.length > 0) parts.push(`missing roles: ${missingRoles.join(", ")}`);
    if (emptyRoles.length > 0) parts.push(`roles with no users: ${emptyRoles.join(", ")}`);
    super(`Invalid role assignments (${parts.join("; ")})`, "validation", {
      missingRoles,
      emptyRoles,
    });
    this.name = "RoleAssignmentError";
    this.missingRoles = missingRoles;
    this.emptyRoles = emptyRoles;
  }
}

export class PermissionDeniedError extends WorkflowError {
  constructor(transitionId: string, requiredRole: Role, actingRole: Role) {
    super(
      `Permission denied: role "${actingRole}" cannot execute transition "${transitionId}" (requires "${requiredRole}")`,
      "permission",
      { requiredRole, actingRole }
    );
    this.name = "PermissionDeniedError";
  }
}

export class InvalidTransitionError extends WorkflowError {
  constructor(
    transitionId: string,
    expectedState: string,
    currentState: string,
    validTransitions: string[]
  ) {
    super(
      `Invalid transition "${transitionId}": content is in "${currentState}", transition starts from "${expectedState}". ` +
        `Valid transitions from "${currentState}": [${validTransitions.join(", ")}]`,
      "invalid_transition",
      { expectedState, currentState, validTransitions }
    );
    this.name = "InvalidTransitionError";
  }
}

export class ConditionNotMetError extends WorkflowError {
  constructor(transitionId: string, condition: string, message: string, details?: Record<string, unknown>) {
    super(`Transition "${transitionId}" condition not met: ${message}`, "condition_not_met", {
      condition,
      ...details,
    });
    this.name = "ConditionNotMetError";
  }
}

/** A collaborator (content store, notifier, audit sink) failed or timed out */
export class CollaboratorError extends WorkflowError {
  constructor(operation: string, cause: string) {
    super(`Collaborator call "${operation}" failed: ${cause}`, "collaborator", { operation });
    this.name = "CollaboratorError";
  }
}

export class OperationCancelledError extends WorkflowError {
  constructor(operation: string) {
    super(`Operation "${operation}" was cancelled before it started`, "cancelled");
    this.name = "OperationCancelledError";
  }
}
