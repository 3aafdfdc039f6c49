/**
 * @curriflow/contracts
 *
 * Public API — the shared boundary between platform and domain.
 * Both sides import from this package. Neither imports from the other.
 */

// Roles and actions
export type { Role, Action, CallerType } from "./permission.js";
export { ROLES, ACTIONS, PRIVILEGED_ACTIONS, isRole } from "./permission.js";

// Templates
export type {
  WorkflowTemplate,
  WorkflowState,
  WorkflowTransition,
  TransitionConditions,
  StatePermission,
  StateType,
  TemplateCategory,
  TemplateSummary,
} from "./template.js";
export {
  STATE_TYPES,
  TEMPLATE_CATEGORIES,
  workflowTemplateSchema,
  workflowStateSchema,
  workflowTransitionSchema,
  statePermissionSchema,
  transitionConditionsSchema,
  defineTemplate,
} from "./template.js";

// Instances
export type {
  WorkflowInstance,
  HistoryEntry,
  InstanceBackup,
  InstanceStore,
  RoleAssignments,
} from "./instance.js";

// Audit
export type {
  AuditEntry,
  AuditOperation,
  AuditSink,
  QueryableAuditSink,
  AuditQuery,
  AuditQueryResult,
  AuditSummary,
  ChangeDescriptor,
} from "./audit.js";

// Collaborators
export type {
  ContentStore,
  Notifier,
  WorkflowNotification,
  NativeWorkflowSnapshot,
} from "./collaborators.js";

// Context
export type { Caller, Logger, DomainEvent, EventSubscriber } from "./context.js";

// Authentication
export type { AuthProvider, AuthResult } from "./auth.js";
