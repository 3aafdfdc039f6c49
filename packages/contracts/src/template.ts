/**
 * Workflow Template Definition
 *
 * A template is a declarative, role-gated state machine for content:
 * states, the transitions between them, and what each role may do in
 * each state. Templates are immutable once registered.
 *
 * The zod schema here checks SHAPE only (types, lengths, enum membership,
 * naming rules). Graph invariants (reachability, single initial state,
 * no exits from final states) are checked by the platform's structural
 * validator, which runs this schema first.
 */

import { z } from "zod";
import { ACTIONS, ROLES, type Action, type Role } from "./permission.js";

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

/** Semantic kinds of state, for UI and reporting */
export const STATE_TYPES = [
  "draft",
  "review",
  "revision",
  "approved",
  "published",
  "archived",
  "rejected",
] as const;

export type StateType = (typeof STATE_TYPES)[number];

export const TEMPLATE_CATEGORIES = ["educational", "corporate", "research"] as const;

export type TemplateCategory = (typeof TEMPLATE_CATEGORIES)[number];

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** What one role may do while content sits in a state */
export interface StatePermission {
  readonly role: Role;
  readonly actions: readonly Action[];
}

export interface WorkflowState {
  /** Unique within the template. Lowercase, digits, `_` and `-`. */
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly stateType: StateType;
  readonly permissions: readonly StatePermission[];
  readonly isInitial: boolean;
  readonly isFinal: boolean;
  /** UI hints (color, icon, short label). Never interpreted by the engine. */
  readonly uiMetadata?: Readonly<Record<string, unknown>>;
}

/**
 * Preconditions on a transition.
 * Only `requireComments` and `minContentLength` are enforced by the engine;
 * any other key is carried as data.
 */
export interface TransitionConditions {
  readonly requireComments?: boolean;
  readonly minContentLength?: number;
  readonly [key: string]: unknown;
}

export interface WorkflowTransition {
  readonly id: string;
  readonly title: string;
  readonly fromState: string;
  readonly toState: string;
  readonly requiredRole: Role;
  readonly conditions?: TransitionConditions;
}

export interface WorkflowTemplate {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly category: TemplateCategory;
  /** Semantic version, `x.y.z` */
  readonly version: string;
  readonly states: readonly WorkflowState[];
  readonly transitions: readonly WorkflowTransition[];
  /** Fallback actions for a role in any state that has no entry for it */
  readonly defaultPermissions: Readonly<Partial<Record<Role, readonly Action[]>>>;
  /** Free-form metadata, e.g. `complexity`, `recommendedFor`, `tags` */
  readonly metadata: Readonly<Record<string, unknown>>;
}

/** Listing view of a template */
export interface TemplateSummary {
  id: string;
  name: string;
  description: string;
  category: TemplateCategory;
  version: string;
  complexity: string;
  statesCount: number;
  transitionsCount: number;
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

/** State ids are case-insensitive: stored lowercased, referenced the same way. */
const stateIdSchema = z
  .string()
  .min(2, "State ID must be at least 2 characters")
  .regex(/^[A-Za-z0-9_-]+$/, "State ID must be alphanumeric with underscores/hyphens")
  .transform((id) => id.toLowerCase());

const stateRefSchema = z
  .string()
  .min(1)
  .transform((id) => id.toLowerCase());

export const statePermissionSchema = z.object({
  role: z.enum(ROLES),
  actions: z.array(z.enum(ACTIONS)),
});

export const workflowStateSchema = z.object({
  id: stateIdSchema,
  title: z.string().min(1, "State title is required"),
  description: z.string().default(""),
  stateType: z.enum(STATE_TYPES),
  permissions: z.array(statePermissionSchema).default([]),
  isInitial: z.boolean().default(false),
  isFinal: z.boolean().default(false),
  uiMetadata: z.record(z.unknown()).optional(),
});

export const transitionConditionsSchema = z
  .object({
    requireComments: z.boolean().optional(),
    minContentLength: z.number().int().nonnegative().optional(),
  })
  .catchall(z.unknown());

export const workflowTransitionSchema = z.object({
  id: z.string().min(1, "Transition ID is required"),
  title: z.string().min(1, "Transition title is required"),
  fromState: stateRefSchema,
  toState: stateRefSchema,
  requiredRole: z.enum(ROLES),
  conditions: transitionConditionsSchema.optional(),
});

export const workflowTemplateSchema = z.object({
  id: z.string().min(2, "Template ID must be at least 2 characters"),
  name: z
    .string()
    .trim()
    .min(3, "Workflow name must be at least 3 characters"),
  description: z.string().default(""),
  category: z.enum(TEMPLATE_CATEGORIES).default("educational"),
  version: z
    .string()
    .regex(/^\d+\.\d+\.\d+$/, "Version must follow semantic versioning (x.y.z)")
    .default("1.0.0"),
  states: z.array(workflowStateSchema).min(2, "A workflow needs at least 2 states"),
  transitions: z
    .array(workflowTransitionSchema)
    .min(1, "A workflow needs at least 1 transition"),
  defaultPermissions: z.record(z.enum(ROLES), z.array(z.enum(ACTIONS))).default({}),
  metadata: z.record(z.unknown()).default({}),
});

/**
 * Identity function for declaring templates in code with full type checking.
 * Structural validation still happens when the template is registered.
 *
 * @example
 * export const SimpleReview = defineTemplate({
 *   id: "simple_review",
 *   name: "Simple Review Workflow",
 *   ...
 * });
 */
export function defineTemplate(template: WorkflowTemplate): WorkflowTemplate {
  return template;
}
